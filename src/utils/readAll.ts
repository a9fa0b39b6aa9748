import type { Source } from "../Source.js";

const DEFAULT_CHUNK_SIZE = 4096;

//Reads `source` until it ends and concatenates what it returned
async function readAll(source:Source, chunkSize = DEFAULT_CHUNK_SIZE):Promise<Buffer>{

    const chunks:Buffer[] = [];

    for(;;){
        const chunk = Buffer.allocUnsafe(chunkSize);
        const n = await source.read(chunk);
        if(n === null){
            break;
        }
        if(n > 0){
            chunks.push(chunk.subarray(0, n));
        }
    }

    return Buffer.concat(chunks);
}

export default readAll;
