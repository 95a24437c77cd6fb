export class ConverterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConverterError";
  }
}

export class TemplateDirectoryMissingError extends ConverterError {
  readonly directory: string;

  constructor(directory: string) {
    super(`Template directory not found: ${directory}`);
    this.name = "TemplateDirectoryMissingError";
    this.directory = directory;
  }
}

export class TemplateMissingError extends ConverterError {
  readonly template: string;
  readonly path: string;

  constructor(template: string, path: string) {
    super(`Missing template "${template}": ${path}`);
    this.name = "TemplateMissingError";
    this.template = template;
    this.path = path;
  }
}
