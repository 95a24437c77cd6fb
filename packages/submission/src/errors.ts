export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UploadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "UploadError";
  }
}

export class RemoteSubmissionError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly body: string = "",
  ) {
    super(message);
    this.name = "RemoteSubmissionError";
  }
}
