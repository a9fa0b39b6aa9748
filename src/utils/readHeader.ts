import { MIN_HEADER_SIZE, type Header } from "../Header.js";
import type { Source } from "../Source.js";
import { ProtocolError, UnexpectedEofError } from "../WebSocketError.js";
import parseFinAndOpcode from "./parseFinAndOpcode.js";
import parseMaskAndPayloadLength from "./parseMaskAndPayloadLength.js";
import ProtocolViolation from "./ProtocolViolation.js";
import readFull from "./readFull.js";

const MASKING_KEY_SIZE = 4;

/**
 * Reads one frame header from `source` in at most two hops: the two fixed bytes,
 * then the extended payload length and masking key together.
 *
 * `scratch` must hold at least 12 bytes; it is overwritten on every call.
 * Resolves null when the source ended cleanly before the header started.
 * Lengths above Number.MAX_SAFE_INTEGER come out rounded; the reader rejects them.
 */
async function readHeader(source:Source, scratch:Buffer):Promise<Header|null>{

    if(!await readFull(source, scratch, MIN_HEADER_SIZE)){
        return null;
    }

    const {isFinished, rsv, opcode} = parseFinAndOpcode(scratch[0]);
    const {isMasked, payloadLength, extendedPayloadLengthSize, extraSize} = parseMaskAndPayloadLength(scratch[1]);

    if(extendedPayloadLengthSize === 0 && payloadLength > 125){
        throw new ProtocolError(ProtocolViolation.HEADER_LENGTH_UNEXPECTED);
    }

    const header:Header = {
        isFinished,
        rsv,
        opcode,
        isMasked,
        maskingKey:null,
        payloadLength
    };

    if(extraSize === 0){
        return header;
    }

    //first two bytes are already parsed, reuse them
    const extra = scratch.subarray(0, extraSize);
    if(!await readFull(source, extra)){
        throw new UnexpectedEofError("Unexpected end of stream inside frame header");
    }

    let offset = 0;
    if(extendedPayloadLengthSize === 2){
        header.payloadLength = extra.readUInt16BE(0);
        offset += 2;
    }else if(extendedPayloadLengthSize === 8){
        if((extra[0] & 0b10000000) !== 0){
            throw new ProtocolError(ProtocolViolation.HEADER_LENGTH_MSB);
        }
        header.payloadLength = Number(extra.readBigUInt64BE(0));
        offset += 8;
    }

    if(isMasked){
        header.maskingKey = Buffer.from(extra.subarray(offset, offset + MASKING_KEY_SIZE));
    }

    return header;
}

export default readHeader;
