import type { Header } from "./Header.js";
import type MessageReader from "./MessageReader.js";
import readAll from "./utils/readAll.js";

export type Message = {
    //header of the first frame
    header:Header;
    payload:Buffer;
}

//Reads one whole message, or resolves null when the source ended between messages
async function readMessage(reader:MessageReader):Promise<Message|null>{
    const header = await reader.nextFrame();
    if(header === null){
        return null;
    }
    const payload = await readAll(reader);
    return {header, payload};
}

export default readMessage;
