import { Code } from "./utils/Code.js";
import type ProtocolViolation from "./utils/ProtocolViolation.js";

class WebSocketError extends Error{

    readonly code:number;

    constructor(code:number, reason?:string){
        super(reason);
        this.name = new.target.name;
        this.code = code;
    }

    get reason(){
        return this.message;
    }
}

export class ProtocolError extends WebSocketError{

    readonly violation:ProtocolViolation;

    constructor(violation:ProtocolViolation){
        super(Code.PROTOCOL_ERROR, violation);
        this.violation = violation;
    }
}

export class FrameTooLargeError extends WebSocketError{

    readonly payloadLength:number;

    constructor(payloadLength:number, maxFrameSize?:number){
        super(
            Code.TOO_LARGE,
            maxFrameSize == null
                ? `Frame payload length ${payloadLength} cannot be read`
                : `Frame payload length ${payloadLength} exceeds max frame size ${maxFrameSize}`
        );
        this.payloadLength = payloadLength;
    }
}

export class InvalidUtf8Error extends WebSocketError{

    //length of the valid UTF-8 prefix of the message
    readonly accepted:number;

    constructor(accepted:number){
        super(Code.INVALID_PAYLOAD, "Text message is not valid UTF-8");
        this.accepted = accepted;
    }
}

export class UnexpectedEofError extends WebSocketError{

    constructor(reason = "Unexpected end of stream"){
        super(Code.RESERVED_ABNORMAL_CLOSE, reason);
    }
}

export class NoFrameAdvanceError extends Error{

    constructor(){
        super("No frame advance: nextFrame() must be called before read()");
        this.name = "NoFrameAdvanceError";
    }
}

export default WebSocketError;
