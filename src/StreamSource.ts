import type { Readable } from "stream";
import type { Source } from "./Source.js";

/**
 * Pulls bytes from a Node readable stream, e.g. the socket of an upgraded connection.
 * Whatever does not fit into the caller's buffer is kept for the next read.
 */
class StreamSource implements Source{

    #stream:Readable;
    #pending:Buffer|null = null;
    #ended = false;
    #error:Error|null = null;
    #wake:(() => void)|null = null;

    constructor(stream:Readable){
        this.#stream = stream;

        stream.on("readable", () => this.#notify());
        stream.on("end", () => {
            this.#ended = true;
            this.#notify();
        });
        stream.on("close", () => {
            this.#ended = true;
            this.#notify();
        });
        stream.on("error", (err) => {
            this.#error = err;
            this.#notify();
        });
    }

    async read(buffer:Buffer):Promise<number|null>{
        let pending = this.#pending;

        while(pending === null){
            pending = this.#nextChunk();
            if(pending !== null){
                break;
            }
            if(this.#error !== null){
                throw this.#error;
            }
            if(this.#ended){
                return null;
            }
            await new Promise<void>((resolve) => {
                this.#wake = resolve;
            });
        }

        const n = pending.copy(buffer);
        this.#pending = n < pending.byteLength ? pending.subarray(n) : null;
        return n;
    }

    #nextChunk():Buffer|null{
        const chunk:unknown = this.#stream.read();

        if(chunk === null){
            return null;
        }
        if(Buffer.isBuffer(chunk)){
            return chunk;
        }
        if(typeof chunk === "string"){
            return Buffer.from(chunk);
        }
        if(chunk instanceof Uint8Array){
            return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
        }
        throw new TypeError("Stream must produce bytes");
    }

    #notify(){
        const wake = this.#wake;
        this.#wake = null;
        wake?.();
    }
}

export default StreamSource;
