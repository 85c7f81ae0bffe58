export { createRewriteEngine } from "./engine";
export { RewriteTooLongError } from "./errors";
export { formatPost, convertLinks, cleanCaption, escapeHtml, measureLength } from "./format";
export type {
  TextGenerator,
  RewriteResult,
  RewriteEngine,
  RewriteEngineOptions,
} from "./engine";
export type { PostParts } from "./format";
