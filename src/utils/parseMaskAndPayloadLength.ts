export type ExtendedPayloadLengthSize = 0 | 2 | 8;

const MASKING_KEY_SIZE = 4;

function parseMaskAndPayloadLength(byte:number){

    const isMasked = (byte & 0b10000000) === 128;
    const payloadLength = byte & 0b01111111;
    let extendedPayloadLengthSize:ExtendedPayloadLengthSize = 0;

    if(payloadLength === 127){
        extendedPayloadLengthSize = 8;
    }else if(payloadLength === 126){
        extendedPayloadLengthSize = 2;
    }

    //bytes still to read after the first two
    const extraSize = extendedPayloadLengthSize + (isMasked ? MASKING_KEY_SIZE : 0);

    return {isMasked, payloadLength, extendedPayloadLengthSize, extraSize};
}

export default parseMaskAndPayloadLength;
