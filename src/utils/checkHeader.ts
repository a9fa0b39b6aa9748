import { MAX_CONTROL_FRAME_PAYLOAD_SIZE, type Header } from "../Header.js";
import { ProtocolError } from "../WebSocketError.js";
import isControlFrame, { isReservedOpcode } from "./isControlFrame.js";
import Opcode from "./Opcode.js";
import ProtocolViolation from "./ProtocolViolation.js";
import Role from "./Role.js";

export type ConnectionState = {
    role:Role;
    fragmented:boolean;
    //an extension owns the rsv bits
    extended:boolean;
}

/**
 * Throws a ProtocolError when `header` is not a legal RFC 6455 frame for the
 * receiving end described by `state`.
 */
function checkHeader(header:Header, {role, fragmented, extended}:ConnectionState):void{

    if(isReservedOpcode(header.opcode)){
        throw new ProtocolError(ProtocolViolation.OPCODE_RESERVED);
    }

    if(isControlFrame(header.opcode)){
        if(header.payloadLength > MAX_CONTROL_FRAME_PAYLOAD_SIZE){
            throw new ProtocolError(ProtocolViolation.CONTROL_PAYLOAD_OVERFLOW);
        }
        if(!header.isFinished){
            throw new ProtocolError(ProtocolViolation.CONTROL_NOT_FINAL);
        }
    }

    if(header.rsv.some(Boolean) && !extended){
        throw new ProtocolError(ProtocolViolation.NON_ZERO_RSV);
    }

    if(role === Role.SERVER && !header.isMasked){
        throw new ProtocolError(ProtocolViolation.MASK_REQUIRED);
    }
    if(role === Role.CLIENT && header.isMasked){
        throw new ProtocolError(ProtocolViolation.MASK_UNEXPECTED);
    }

    if(fragmented && !isControlFrame(header.opcode) && header.opcode !== Opcode.CONTINUATION){
        throw new ProtocolError(ProtocolViolation.CONTINUATION_EXPECTED);
    }
    if(!fragmented && header.opcode === Opcode.CONTINUATION){
        throw new ProtocolError(ProtocolViolation.CONTINUATION_UNEXPECTED);
    }
}

export default checkHeader;
