import type { Source } from "./Source.js";
import { UnexpectedEofError } from "./WebSocketError.js";

const DRAIN_CHUNK_SIZE = 16 * 1024;

/**
 * Raw view over exactly one frame payload of the underlying source.
 * It is the innermost stage of the payload chain and is also drained directly
 * when a frame is skipped, bypassing unmasking and UTF-8 checks.
 */
class LimitedReader implements Source{

    #source:Source|null = null;
    #remaining = 0;

    get remaining(){
        return this.#remaining;
    }

    reset(source:Source|null = null, length = 0){
        this.#source = source;
        this.#remaining = source === null ? 0 : length;
    }

    async read(buffer:Buffer):Promise<number|null>{
        if(this.#source === null || this.#remaining === 0){
            return null;
        }

        const size = Math.min(buffer.byteLength, this.#remaining);
        const n = await this.#source.read(buffer.subarray(0, size));
        if(n === null){
            return null;
        }
        this.#remaining -= n;
        return n;
    }

    //skips what is left of the frame
    async drain():Promise<void>{
        if(this.#remaining === 0){
            return;
        }

        const scratch = Buffer.allocUnsafe(Math.min(this.#remaining, DRAIN_CHUNK_SIZE));
        while(this.#remaining > 0){
            if(await this.read(scratch) === null){
                throw new UnexpectedEofError();
            }
        }
    }
}

export default LimitedReader;
