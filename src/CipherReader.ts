import type { Source } from "./Source.js";
import cipher from "./utils/cipher.js";

//Unmasks a frame payload while it is read; the key position carries over between reads
class CipherReader implements Source{

    #source:Source;
    #maskingKey:Buffer;
    #position = 0;

    constructor(source:Source, maskingKey:Buffer){
        this.#source = source;
        this.#maskingKey = maskingKey;
    }

    reset(source:Source, maskingKey:Buffer){
        this.#source = source;
        this.#maskingKey = maskingKey;
        this.#position = 0;
    }

    async read(buffer:Buffer):Promise<number|null>{
        const n = await this.#source.read(buffer);
        if(n === null){
            return null;
        }

        cipher(buffer.subarray(0, n), this.#maskingKey, this.#position);
        this.#position += n;
        return n;
    }
}

export default CipherReader;
