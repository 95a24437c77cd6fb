import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { TemplateDirectoryMissingError, TemplateMissingError } from "@/errors";
import { DEFAULT_TEMPLATES_DIR, loadTemplate, loadTemplates, renderTemplate } from "@/template-store";
import { TEMPLATE_FILES } from "@/types";

describe("renderTemplate", () => {
    test("replaces every occurrence of a known placeholder", () => {
        const result = renderTemplate({ name: "t", text: "{a}-{a}" }, { a: "1" });
        expect(result).toBe("1-1");
    });

    test("leaves unknown placeholders as literal text", () => {
        const result = renderTemplate({ name: "t", text: "{a}-{b}" }, { a: "1" });
        expect(result).toBe("1-{b}");
    });

    test("does not rescan substituted values", () => {
        const result = renderTemplate({ name: "t", text: "{a}{b}" }, { a: "{b}", b: "2" });
        expect(result).toBe("{b}2");
    });

    test("ignores braces that are not placeholder tokens", () => {
        const result = renderTemplate({ name: "t", text: "{ not one }{x}" }, { x: "y" });
        expect(result).toBe("{ not one }y");
    });

    test("returns the text unchanged without substitutions", () => {
        expect(renderTemplate({ name: "t", text: "<img src=\"{url}\">" })).toBe("<img src=\"{url}\">");
    });
});

describe("loadTemplates", () => {
    let scratch: string | null = null;

    afterEach(() => {
        if (scratch) rmSync(scratch, { recursive: true, force: true });
        scratch = null;
    });

    test("loads every template from the bundled directory", () => {
        const templates = loadTemplates(DEFAULT_TEMPLATES_DIR);
        expect(templates.heading1.name).toBe("一级标题.html");
        expect(templates.heading1.text).toContain("{index}");
        expect(templates.heading1.text).toContain("{title}");
        expect(templates.contentBlock.text).toContain("{content}");
    });

    test("throws TemplateDirectoryMissingError for a missing directory", () => {
        const missing = join(tmpdir(), "md2wechat-no-such-dir");
        expect(() => loadTemplates(missing)).toThrow(TemplateDirectoryMissingError);
    });

    test("throws TemplateMissingError naming the absent file", () => {
        scratch = mkdtempSync(join(tmpdir(), "md2wechat-tpl-"));
        for (const name of Object.values(TEMPLATE_FILES)) {
            if (name !== TEMPLATE_FILES.terminator) {
                writeFileSync(join(scratch, name), "<x/>", "utf-8");
            }
        }
        let caught: unknown;
        try {
            loadTemplates(scratch);
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(TemplateMissingError);
        if (caught instanceof TemplateMissingError) {
            expect(caught.template).toBe("结束符.html");
            expect(caught.message).toContain("结束符.html");
        }
    });

    test("loadTemplate reads a single file as UTF-8", () => {
        scratch = mkdtempSync(join(tmpdir(), "md2wechat-tpl-"));
        writeFileSync(join(scratch, "文本.html"), "<p>{content}</p>", "utf-8");
        expect(loadTemplate(scratch, "text")).toEqual({ name: "文本.html", text: "<p>{content}</p>" });
    });
});
