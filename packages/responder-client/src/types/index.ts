/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, OutputItemType, EventType } from "./enums.js";

// Input items
export type {
  InputTextContent,
  InputImageContent,
  OutputTextContent,
  InputContent,
  InputMessage,
  FunctionCallInput,
  FunctionCallOutputInput,
  InputItem,
} from "./input.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createFunctionCallOutput,
  toInputItems,
} from "./input.js";

// Request types
export type {
  FunctionTool,
  ToolChoice,
  ReasoningConfig,
  Plugin,
  TextFormat,
  Request,
} from "./request.js";

// Response types
export type {
  UrlCitation,
  Annotation,
  OutputTextPart,
  SummaryTextPart,
  ItemStatus,
  MessageItem,
  ReasoningItem,
  FunctionCallItem,
  OutputItem,
  Usage,
  ResponseStatus,
  ResponseErrorInfo,
  Response,
} from "./response.js";
export {
  getMessageText,
  getOutputText,
  getReasoningText,
  getFunctionCalls,
  getFirstMessage,
} from "./response.js";

// Stream events
export type {
  ResponseSnapshot,
  CreatedEvent,
  InProgressEvent,
  OutputItemAddedEvent,
  OutputItemDoneEvent,
  ContentPartAddedEvent,
  TextDeltaEvent,
  TextDoneEvent,
  AnnotationAddedEvent,
  ReasoningDeltaEvent,
  ReasoningDoneEvent,
  FunctionCallDeltaEvent,
  FunctionCallDoneEvent,
  CompletedEvent,
  IncompleteEvent,
  FailedEvent,
  ErrorEvent,
  TerminalEvent,
  ResponseEvent,
} from "./events.js";
export { isTerminalEvent } from "./events.js";

// Error types
export {
  SDKError,
  HttpError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  AbortError,
  NetworkError,
  StreamError,
  StreamAbortedError,
  InvalidResponseError,
  ConfigurationError,
} from "./errors.js";
export type { HttpErrorOptions } from "./errors.js";
