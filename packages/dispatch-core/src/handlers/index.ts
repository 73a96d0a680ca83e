export type {
  HandlerContext,
  MessageHandler,
  MessageHandlerFn,
  HandlerRegistration,
  HandlerInfo,
} from "./types.js";
export { HandlerRegistry, toMessageHandler } from "./HandlerRegistry.js";
