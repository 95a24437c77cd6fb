export { renderWechatHtml, convertMarkdown, renderWechatHtmlWithDebug, type ConvertOptions } from "./render-wechat-html";
export {
  DEFAULT_TEMPLATES_DIR,
  loadTemplates,
  loadTemplate,
  createTemplateSet,
  renderTemplate,
} from "./template-store";
export { renderInline, escapeHtml } from "./inline-renderer";
export { buildListForest, renderList, parseListLine } from "./list-renderer";
export { parseTable, renderTable, splitTableRow } from "./table-renderer";
export { readBlocks } from "./block-parser";
export { DocumentAssembler } from "./assembler";
export { ConverterError, TemplateDirectoryMissingError, TemplateMissingError } from "./errors";
export type { DebugSnapshot } from "./debug";
export { TEMPLATE_FILES } from "./types";
export type { Block, BlockKind, ListItem, ListNode, Table, Template, TemplateKey, TemplateSet } from "./types";
