export type { DispatchOptions, MessageBusDeps, MessageRoute } from "./MessageBus.js";
export { MessageBus } from "./MessageBus.js";

export type { MessageBusBuilderOptions } from "./MessageBusBuilder.js";
export { MessageBusBuilder, createMessageBusBuilder } from "./MessageBusBuilder.js";
