import CipherReader from "./CipherReader.js";
import { MAX_HEADER_SIZE, MIN_HEADER_SIZE, type Header } from "./Header.js";
import LimitedReader from "./LimitedReader.js";
import type { RecvExtension } from "./RecvExtension.js";
import type { Source } from "./Source.js";
import Utf8Reader from "./Utf8Reader.js";
import checkHeader from "./utils/checkHeader.js";
import isControlFrame from "./utils/isControlFrame.js";
import Opcode from "./utils/Opcode.js";
import readHeader from "./utils/readHeader.js";
import Role from "./utils/Role.js";
import {
    FrameTooLargeError,
    InvalidUtf8Error,
    NoFrameAdvanceError,
    UnexpectedEofError
} from "./WebSocketError.js";

/**
 * Handles a frame header and its payload. The payload is already unmasked.
 * It is awaited before `nextFrame()` returns; throwing aborts that call.
 */
export type FrameHandler = (header:Header, payload:Source) => void|Promise<void>;

export type MessageReaderOptions = {
    //skip the RFC 6455 header checks
    skipHeaderCheck?:boolean;
    //reject text messages that are not valid UTF-8
    checkUtf8?:boolean;
    //negotiated extensions, applied in order
    extensions?:readonly RecvExtension[];
    //largest payload length a single frame may declare, 0 means no limit
    maxFrameSize?:number;
    onContinuation?:FrameHandler;
    //control frames received between the fragments of a message
    onIntermediate?:FrameHandler;
}

/**
 * Reads WebSocket messages from a byte source.
 *
 * Call `nextFrame()` to open a message, then `read()` until it resolves null.
 * Fragmented messages are joined transparently and control frames received
 * between their fragments go to `onIntermediate` instead of `read()`.
 *
 * Calls must not overlap.
 */
class MessageReader implements Source{

    readonly role:Role;

    #source:Source;
    #skipHeaderCheck:boolean;
    #checkUtf8:boolean;
    #extensions:readonly RecvExtension[];
    #maxFrameSize:number;
    #onContinuation:FrameHandler|undefined;
    #onIntermediate:FrameHandler|undefined;

    #fragmented = false;
    //opcode of the message being read, kept across its fragments
    #opcode = Opcode.CONTINUATION;
    #frame:Source|null = null;
    #raw = new LimitedReader();
    #utf8 = new Utf8Reader();
    #cipher:CipherReader|null = null;
    #scratch = Buffer.alloc(MAX_HEADER_SIZE - MIN_HEADER_SIZE);

    constructor(source:Source, role:Role, {
        skipHeaderCheck = false,
        checkUtf8 = false,
        extensions = [],
        maxFrameSize = 0,
        onContinuation,
        onIntermediate
    }:MessageReaderOptions = {}){
        if(!Number.isSafeInteger(maxFrameSize) || maxFrameSize < 0){
            throw new Error(`Max frame size must be a non-negative integer, got ${maxFrameSize}`);
        }

        this.role = role;
        this.#source = source;
        this.#skipHeaderCheck = skipHeaderCheck;
        this.#checkUtf8 = checkUtf8;
        this.#extensions = extensions;
        this.#maxFrameSize = maxFrameSize;
        this.#onContinuation = onContinuation;
        this.#onIntermediate = onIntermediate;
    }

    static clientSide(source:Source, options?:MessageReaderOptions){
        return new MessageReader(source, Role.CLIENT, options);
    }

    static serverSide(source:Source, options?:MessageReaderOptions){
        return new MessageReader(source, Role.SERVER, options);
    }

    get fragmented(){
        return this.#fragmented;
    }

    /**
     * Reads the payload of the current message.
     *
     * Resolves null only once the whole message was read. It may resolve 0 when
     * a frame boundary or an intermediate control frame was crossed.
     */
    async read(buffer:Buffer):Promise<number|null>{
        if(this.#frame === null){
            if(!this.#fragmented){
                throw new NoFrameAdvanceError();
            }
            //next continuation or intermediate control frame
            await this.nextFrame();
            if(this.#frame === null){
                return 0;
            }
        }

        const n = await this.#frame.read(buffer);

        if(n !== null){
            if(n > 0 && this.#raw.remaining === 0 && this.#fragmented){
                this.#resetFragment();
            }
            return n;
        }

        if(this.#raw.remaining !== 0){
            throw new UnexpectedEofError();
        }
        if(this.#fragmented){
            this.#resetFragment();
            return 0;
        }
        //only the complete message tells whether the text was valid
        if(this.#checkUtf8 && !this.#utf8.valid){
            throw new InvalidUtf8Error(this.#utf8.accepted);
        }

        this.#reset();
        return null;
    }

    /**
     * Skips the rest of the current message, including fragments not received yet.
     * The reader is reset even when skipping fails.
     */
    async discard():Promise<void>{
        try{
            for(;;){
                await this.#raw.drain();
                if(!this.#fragmented){
                    break;
                }
                await this.nextFrame();
            }
        }finally{
            this.#reset();
        }
    }

    /**
     * Reads the next frame header and prepares its payload for reading.
     *
     * The payload of the current frame must have been read or discarded before.
     * Resolves null when the source ended between two messages.
     */
    async nextFrame():Promise<Header|null>{
        let header = await readHeader(this.#source, this.#scratch);

        if(header === null){
            if(this.#fragmented){
                //the peer left a fragmented message unfinished
                throw new UnexpectedEofError("Unexpected end of stream inside a fragmented message");
            }
            return null;
        }

        if(!this.#skipHeaderCheck){
            checkHeader(header, {
                role:this.role,
                fragmented:this.#fragmented,
                extended:this.#extensions.length > 0
            });
        }

        if(!Number.isSafeInteger(header.payloadLength)){
            throw new FrameTooLargeError(header.payloadLength);
        }
        if(this.#maxFrameSize > 0 && header.payloadLength > this.#maxFrameSize){
            throw new FrameTooLargeError(header.payloadLength, this.#maxFrameSize);
        }

        this.#raw.reset(this.#source, header.payloadLength);

        let frame:Source = this.#raw;
        if(header.maskingKey !== null){
            if(this.#cipher === null){
                this.#cipher = new CipherReader(frame, header.maskingKey);
            }else{
                this.#cipher.reset(frame, header.maskingKey);
            }
            frame = this.#cipher;
        }

        for(const extension of this.#extensions){
            header = extension.unsetBits(header);
        }

        if(this.#fragmented){
            if(isControlFrame(header.opcode)){
                if(this.#onIntermediate){
                    await this.#onIntermediate(header, frame);
                }
                await this.#raw.drain();
                return header;
            }
        }else{
            //a new message, the previous one may have ended without a closing read()
            this.#opcode = header.opcode;
            this.#utf8.reset();
        }

        if(this.#checkUtf8 && this.#opcode === Opcode.TEXT){
            this.#utf8.source = frame;
            frame = this.#utf8;
        }

        this.#frame = frame;

        try{
            if(header.opcode === Opcode.CONTINUATION && this.#onContinuation){
                await this.#onContinuation(header, frame);
            }
        }finally{
            this.#fragmented = !header.isFinished;
        }

        return header;
    }

    //frame is done, the message goes on
    #resetFragment(){
        this.#raw.reset();
        this.#frame = null;
        this.#utf8.source = null;
    }

    #reset(){
        this.#raw.reset();
        this.#frame = null;
        this.#utf8.reset();
        this.#opcode = Opcode.CONTINUATION;
        this.#fragmented = false;
    }
}

export default MessageReader;
