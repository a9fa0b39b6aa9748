import type Opcode from "./Opcode.js";

function parseFinAndOpcode(byte:number){

    const isFinished = (byte & 0b10000000) === 128;
    const rsv1 = (byte & 0b01000000) !== 0;
    const rsv2 = (byte & 0b00100000) !== 0;
    const rsv3 = (byte & 0b00010000) !== 0;
    const rsv:[boolean, boolean, boolean] = [rsv1, rsv2, rsv3];
    //reserved values are kept as they are and rejected by checkHeader
    const opcode:Opcode = byte & 0b00001111;

    return {isFinished, rsv, opcode};
}

export default parseFinAndOpcode;
