import { isDebugMode, logDebug } from "./debug";
import { renderTemplate } from "./template-store";
import type { TemplateSet } from "./types";

/**
 * Collects fragments into 正文区块 sections and top-level entries.
 *
 * At most one section is open at a time. The first section ever opened starts with the
 * top banner; `finish` puts the bottom banner into the last section and appends the
 * terminator.
 */
export class DocumentAssembler {
  private readonly output: string[] = [];
  private section: string[] | null = null;
  private sectionsOpened = 0;

  constructor(private readonly templates: TemplateSet) {}

  public get inSection(): boolean {
    return this.section !== null;
  }

  public get sectionCount(): number {
    return this.sectionsOpened;
  }

  public append(fragment: string): void {
    this.currentSection().push(fragment);
  }

  public emitTopLevel(fragment: string): void {
    this.sealSection();
    this.output.push(fragment);
  }

  public sealSection(): void {
    if (!this.section) return;
    const content = this.section.join("");
    this.output.push(renderTemplate(this.templates.contentBlock, { content }));
    if (isDebugMode()) {
      logDebug(`Sealed section ${this.sectionsOpened} with ${this.section.length} fragments`);
    }
    this.section = null;
  }

  public fragments(): readonly string[] {
    return this.output;
  }

  public finish(): string {
    if (this.section || this.sectionsOpened > 0) {
      this.append(renderTemplate(this.templates.bannerBottom));
      this.sealSection();
    }
    this.output.push(renderTemplate(this.templates.terminator));
    return this.output.join("");
  }

  private currentSection(): string[] {
    if (this.section) return this.section;
    const section: string[] = [];
    if (this.sectionsOpened === 0) {
      section.push(renderTemplate(this.templates.bannerTop));
    }
    this.sectionsOpened++;
    if (isDebugMode()) {
      logDebug(`Opened section ${this.sectionsOpened}`);
    }
    this.section = section;
    return section;
  }
}
