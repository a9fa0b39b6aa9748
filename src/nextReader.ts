import type { Header } from "./Header.js";
import MessageReader from "./MessageReader.js";
import type { Source } from "./Source.js";
import type Role from "./utils/Role.js";

export type NextReaderResult = {
    header:Header;
    reader:MessageReader;
}

/**
 * Opens the next message of `source` and returns a reader positioned on its payload,
 * or null when the source already ended.
 *
 * Control frames that the peer sends between the fragments of that message are
 * dropped without notice. Use a MessageReader with `onIntermediate` when they matter.
 */
async function nextReader(source:Source, role:Role):Promise<NextReaderResult|null>{
    const reader = new MessageReader(source, role);
    const header = await reader.nextFrame();
    if(header === null){
        return null;
    }
    return {header, reader};
}

export default nextReader;
