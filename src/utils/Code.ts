//Close status codes the reader's errors carry
export enum Code{
    PROTOCOL_ERROR = 1002,
    RESERVED_ABNORMAL_CLOSE = 1006,
    INVALID_PAYLOAD = 1007,
    TOO_LARGE = 1009,
}
