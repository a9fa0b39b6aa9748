import type { Source } from "../Source.js";
import { UnexpectedEofError } from "../WebSocketError.js";

/**
 * Fills `buffer` up to `length` bytes from `source`.
 * Resolves false when the source ended before the first byte; a partial fill is an error.
 */
async function readFull(source:Source, buffer:Buffer, length = buffer.byteLength):Promise<boolean>{

    let offset = 0;

    while(offset < length){
        const n = await source.read(buffer.subarray(offset, length));
        if(n === null){
            if(offset === 0){
                return false;
            }
            throw new UnexpectedEofError();
        }
        offset += n;
    }

    return true;
}

export default readFull;
