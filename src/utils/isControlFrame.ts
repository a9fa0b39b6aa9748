import Opcode from "./Opcode.js";

export type ControlOpcode =
| Opcode.CLOSE
| Opcode.PING
| Opcode.PONG

const CONTROL_FRAME_OPCODE:readonly number[] = [Opcode.CLOSE, Opcode.PING, Opcode.PONG];
const DATA_FRAME_OPCODE:readonly number[] = [Opcode.CONTINUATION, Opcode.TEXT, Opcode.BINARY];

function isControlFrame(opcode:number):opcode is ControlOpcode {
    return CONTROL_FRAME_OPCODE.includes(opcode);
}

export function isReservedOpcode(opcode:number){
    return !CONTROL_FRAME_OPCODE.includes(opcode) && !DATA_FRAME_OPCODE.includes(opcode);
}

export default isControlFrame;
