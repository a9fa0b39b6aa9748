import type { Source } from "./Source.js";
import { InvalidUtf8Error } from "./WebSocketError.js";

const CONTINUATION_LOWER_BOUNDARY = 0x80;
const CONTINUATION_UPPER_BOUNDARY = 0xBF;

/**
 * Validates UTF-8 incrementally while bytes pass through.
 *
 * A code point may be split across reads and across the frames of one message,
 * so the decoder state survives a change of `source`. Overlong forms, surrogates
 * and code points above U+10FFFF are rejected.
 */
class Utf8Reader implements Source{

    source:Source|null = null;

    #bytesNeeded = 0;
    #lowerBoundary = CONTINUATION_LOWER_BOUNDARY;
    #upperBoundary = CONTINUATION_UPPER_BOUNDARY;
    #processed = 0;
    #accepted = 0;
    #rejected = false;

    //true when nothing invalid was seen and no sequence is left open
    get valid(){
        return !this.#rejected && this.#bytesNeeded === 0;
    }

    get accepted(){
        return this.#accepted;
    }

    reset(){
        this.source = null;
        this.#bytesNeeded = 0;
        this.#lowerBoundary = CONTINUATION_LOWER_BOUNDARY;
        this.#upperBoundary = CONTINUATION_UPPER_BOUNDARY;
        this.#processed = 0;
        this.#accepted = 0;
        this.#rejected = false;
    }

    async read(buffer:Buffer):Promise<number|null>{
        if(this.#rejected){
            throw new InvalidUtf8Error(this.#accepted);
        }
        if(this.source === null){
            return null;
        }

        const n = await this.source.read(buffer);
        if(n === null){
            return null;
        }

        for(let i = 0; i < n; i++){
            if(!this.#accept(buffer[i])){
                this.#rejected = true;
                throw new InvalidUtf8Error(this.#accepted);
            }
            if(this.#bytesNeeded === 0){
                this.#accepted = this.#processed + i + 1;
            }
        }
        this.#processed += n;

        return n;
    }

    #accept(byte:number):boolean{
        if(this.#bytesNeeded === 0){
            if(byte <= 0x7F){
                return true;
            }
            if(byte >= 0xC2 && byte <= 0xDF){
                this.#bytesNeeded = 1;
                return true;
            }
            if(byte >= 0xE0 && byte <= 0xEF){
                if(byte === 0xE0){
                    //overlong
                    this.#lowerBoundary = 0xA0;
                }else if(byte === 0xED){
                    //surrogates
                    this.#upperBoundary = 0x9F;
                }
                this.#bytesNeeded = 2;
                return true;
            }
            if(byte >= 0xF0 && byte <= 0xF4){
                if(byte === 0xF0){
                    this.#lowerBoundary = 0x90;
                }else if(byte === 0xF4){
                    //above U+10FFFF
                    this.#upperBoundary = 0x8F;
                }
                this.#bytesNeeded = 3;
                return true;
            }
            return false;
        }

        if(byte < this.#lowerBoundary || byte > this.#upperBoundary){
            return false;
        }

        this.#lowerBoundary = CONTINUATION_LOWER_BOUNDARY;
        this.#upperBoundary = CONTINUATION_UPPER_BOUNDARY;
        this.#bytesNeeded--;
        return true;
    }
}

export default Utf8Reader;
