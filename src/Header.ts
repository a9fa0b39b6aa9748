import type Opcode from "./utils/Opcode.js";

export const MIN_HEADER_SIZE = 2;
export const MAX_HEADER_SIZE = 14;
export const MAX_CONTROL_FRAME_PAYLOAD_SIZE = 125;

export type Header = {
    isFinished:boolean;
    rsv:[boolean, boolean, boolean];
    opcode:Opcode;
    isMasked:boolean;
    //4 bytes when isMasked, null otherwise
    maskingKey:Buffer|null;
    payloadLength:number;
}
