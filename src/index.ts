export { default as MessageReader } from "./MessageReader.js";
export type { FrameHandler, MessageReaderOptions } from "./MessageReader.js";
export { default as nextReader } from "./nextReader.js";
export type { NextReaderResult } from "./nextReader.js";
export { default as readMessage } from "./readMessage.js";
export type { Message } from "./readMessage.js";
export { default as inspectFrames, formatSummary } from "./inspectFrames.js";
export type { InspectOptions, MessageSummary } from "./inspectFrames.js";

export type { Header } from "./Header.js";
export { MAX_CONTROL_FRAME_PAYLOAD_SIZE, MAX_HEADER_SIZE, MIN_HEADER_SIZE } from "./Header.js";
export type { Source } from "./Source.js";
export type { RecvExtension } from "./RecvExtension.js";

export { default as BufferSource } from "./BufferSource.js";
export { default as StreamSource } from "./StreamSource.js";
export { default as LimitedReader } from "./LimitedReader.js";
export { default as CipherReader } from "./CipherReader.js";
export { default as Utf8Reader } from "./Utf8Reader.js";

export {
    default as WebSocketError,
    FrameTooLargeError,
    InvalidUtf8Error,
    NoFrameAdvanceError,
    ProtocolError,
    UnexpectedEofError
} from "./WebSocketError.js";

export { default as Opcode } from "./utils/Opcode.js";
export { default as Role } from "./utils/Role.js";
export { Code } from "./utils/Code.js";
export { default as ProtocolViolation } from "./utils/ProtocolViolation.js";
export { default as isControlFrame, isReservedOpcode } from "./utils/isControlFrame.js";
export { default as checkHeader } from "./utils/checkHeader.js";
export type { ConnectionState } from "./utils/checkHeader.js";
export { default as readHeader } from "./utils/readHeader.js";
export { default as cipher } from "./utils/cipher.js";
export { default as readAll } from "./utils/readAll.js";
