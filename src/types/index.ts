/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  InputConfig,
  RenderConfig,
  OutputConfig,
  TocConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export { AppConfigSchema, PartialAppConfigSchema } from "./config";

// Events
export type {
  HeadingLevel,
  SlugLevel,
  BlockTag,
  InlineTag,
  MarkdownEvent,
  MarkdownEventKind,
  StartBlockEvent,
  EndBlockEvent,
  StartHeadingEvent,
  EndHeadingEvent,
  StartInlineEvent,
  EndInlineEvent,
  TextEvent,
  CodeEvent,
  SoftBreakEvent,
  HardBreakEvent,
  RuleEvent,
  Tokenizer,
} from "./events";

// Render results
export type {
  HeadingRecord,
  RenderNote,
  DegenerateSlugNote,
  RenderIssue,
  InputIssue,
  InternalIssue,
  InputIssueReason,
  InternalIssueReason,
  RenderOutput,
  RenderSuccess,
  RenderFailure,
  RenderResult,
} from "./render";

// Config loading
export type { ConfigError, CliContext } from "./context";
