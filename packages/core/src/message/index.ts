export { MessageBuilder, buildOutgoingMessage } from './message-builder.js';
export type { BuildHandle, BuildOptions, BuildState, MessageBuilderOptions } from './message-builder.js';
export { DEFAULT_MESSAGE_TTL_MS, toWireFormat, fromWireFormat, hasProofOfWork } from './outgoing-message.js';
export type { OutgoingMessage, ProvenOutgoingMessage, PlainOutgoingMessage, WireMessage } from './outgoing-message.js';
