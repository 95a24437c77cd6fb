export { loadSubmissionConfig, parseBool, DEFAULT_REMOTE_TIMEOUT_MS, type RemoteConfig, type SubmissionConfig } from "./config";
export { ConfigError, RemoteSubmissionError, UploadError } from "./errors";
export { createLogger, logger, resolveLogLevel, type LogLevel, type Logger, type LogSink } from "./logger";
export {
  processUpload,
  listMarkdownFiles,
  formatTimestamp,
  folderNameFor,
  safeFilename,
  type ProcessOptions,
  type ProcessResult,
  type UploadMeta,
  type UserMeta,
} from "./processor";
export { buildPayloadZip, buildManifest, type SubmissionManifest } from "./payload";
export {
  postSubmissionZip,
  sendToRemote,
  storedFolder,
  submissionUrl,
  type FetchLike,
  type PostSubmissionOptions,
  type SendToRemoteDeps,
  type SubmissionResponse,
} from "./remote-client";
