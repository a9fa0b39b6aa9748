import type { Header } from "./Header.js";
import MessageReader, { type MessageReaderOptions } from "./MessageReader.js";
import readMessage from "./readMessage.js";
import type { Source } from "./Source.js";
import Opcode from "./utils/Opcode.js";
import readAll from "./utils/readAll.js";
import Role from "./utils/Role.js";

const CLOSE_FRAME_CODE_SIZE = 2;

export type InspectOptions = Pick<MessageReaderOptions, "checkUtf8"|"maxFrameSize"|"skipHeaderCheck"|"extensions"> & {
    role?:Role;
}

export type MessageSummary = {
    opcode:Opcode;
    length:number;
    fragments:number;
    //control frame received between the fragments of another message
    intermediate:boolean;
    text?:string;
    code?:number;
    reason?:string;
}

const parseCloseFramePayload = (payload:Buffer) => {

    const code = payload.readUIntBE(0, CLOSE_FRAME_CODE_SIZE);
    const reason = payload.toString("utf8", CLOSE_FRAME_CODE_SIZE);

    return {code, reason};
};

function summarize({opcode}:Header, payload:Buffer, fragments:number, intermediate:boolean):MessageSummary{

    const summary:MessageSummary = {opcode, length:payload.byteLength, fragments, intermediate};

    if(opcode === Opcode.TEXT){
        summary.text = payload.toString("utf8");
    }else if(opcode === Opcode.CLOSE && payload.byteLength >= CLOSE_FRAME_CODE_SIZE){
        const {code, reason} = parseCloseFramePayload(payload);
        summary.code = code;
        summary.reason = reason;
    }

    return summary;
}

/**
 * Reads every message of `source` and describes it, in the order the reads
 * completed: a ping interleaved with fragments is listed before its message.
 */
async function inspectFrames(source:Source, {role = Role.SERVER, ...options}:InspectOptions = {}):Promise<MessageSummary[]>{

    const summaries:MessageSummary[] = [];
    let fragments = 0;

    const reader = new MessageReader(source, role, {
        ...options,
        onContinuation:() => {
            fragments++;
        },
        onIntermediate:async (header, payload) => {
            summaries.push(summarize(header, await readAll(payload), 1, true));
        }
    });

    for(;;){
        fragments = 1;
        const message = await readMessage(reader);
        if(message === null){
            break;
        }
        summaries.push(summarize(message.header, message.payload, fragments, false));
    }

    return summaries;
}

export function formatSummary({opcode, length, fragments, intermediate, text, code, reason}:MessageSummary){

    let line = `${Opcode[opcode] ?? "UNKNOWN"} ${length} bytes`;

    if(intermediate){
        line += " (intermediate)";
    }else if(fragments > 1){
        line += ` in ${fragments} frames`;
    }
    if(text !== undefined){
        line += ` ${JSON.stringify(text)}`;
    }
    if(code !== undefined){
        line += ` code:${code} reason:${JSON.stringify(reason ?? "")}`;
    }

    return line;
}

export default inspectFrames;
