import type { Source } from "./Source.js";

type BufferSourceOptions = {
    //upper bound of bytes handed out per read
    chunkSize?:number;
}

class BufferSource implements Source{

    #buffer:Buffer;
    #offset = 0;
    #chunkSize:number;

    constructor(buffer:Buffer, {chunkSize = Number.POSITIVE_INFINITY}:BufferSourceOptions = {}){
        if(!(chunkSize >= 1)){
            throw new Error("Chunk size must be at least 1 byte");
        }
        this.#buffer = buffer;
        this.#chunkSize = chunkSize;
    }

    get offset(){
        return this.#offset;
    }

    get remaining(){
        return this.#buffer.byteLength - this.#offset;
    }

    async read(buffer:Buffer):Promise<number|null>{
        if(this.remaining === 0){
            return null;
        }

        const size = Math.min(buffer.byteLength, this.#chunkSize, this.remaining);
        const n = this.#buffer.copy(buffer, 0, this.#offset, this.#offset + size);
        this.#offset += n;
        return n;
    }
}

export default BufferSource;
