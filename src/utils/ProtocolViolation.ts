enum ProtocolViolation {
    HEADER_LENGTH_MSB = "Header error: the most significant bit of the 64-bit payload length must be 0",
    HEADER_LENGTH_UNEXPECTED = "Header error: unexpected payload length bits",
    OPCODE_RESERVED = "Use of reserved opcode",
    CONTROL_PAYLOAD_OVERFLOW = "Control frame payload size exceeds 125",
    CONTROL_NOT_FINAL = "Control frame must not be fragmented",
    NON_ZERO_RSV = "Non-zero rsv bits with no extension negotiated",
    MASK_REQUIRED = "Frames from client to server must be masked",
    MASK_UNEXPECTED = "Frames from server to client must not be masked",
    CONTINUATION_EXPECTED = "Unexpected non-continuation data frame",
    CONTINUATION_UNEXPECTED = "Unexpected continuation data frame",
}

export default ProtocolViolation;
