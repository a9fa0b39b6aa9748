#!/usr/bin/env node
import { createReadStream } from "fs";
import { parseArgs } from "util";
import inspectFrames, { formatSummary } from "./inspectFrames.js";
import StreamSource from "./StreamSource.js";
import Role from "./utils/Role.js";

const USAGE = "Usage: ws-frames <capture-file> [--role server|client] [--check-utf8] [--max-frame-size N] [--skip-header-check]";

function parseRole(value:string):Role{
    switch(value){
        case Role.SERVER:
            return Role.SERVER;
        case Role.CLIENT:
            return Role.CLIENT;
        default:
            throw new Error(`Unknown role "${value}", expected "server" or "client"`);
    }
}

async function main(args:string[]):Promise<number>{

    const {values, positionals} = parseArgs({
        args,
        allowPositionals:true,
        options:{
            "role":{type:"string", default:Role.SERVER},
            "check-utf8":{type:"boolean", default:false},
            "max-frame-size":{type:"string", default:"0"},
            "skip-header-check":{type:"boolean", default:false},
            "help":{type:"boolean", short:"h", default:false},
        }
    });

    if(values.help || positionals.length !== 1){
        console.log(USAGE);
        return values.help ? 0 : 1;
    }

    const [file] = positionals;
    const source = new StreamSource(createReadStream(file));

    try{
        const summaries = await inspectFrames(source, {
            role:parseRole(values.role ?? Role.SERVER),
            checkUtf8:values["check-utf8"] ?? false,
            maxFrameSize:Number(values["max-frame-size"] ?? "0"),
            skipHeaderCheck:values["skip-header-check"] ?? false,
        });

        summaries.forEach((summary) => console.log("[INFO]", formatSummary(summary)));
        console.log("[INFO] messages:", summaries.length);
        return 0;
    }catch(err){
        console.error("[ERROR] ", err);
        return 1;
    }
}

main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
}, (err) => {
    console.error("[ERROR] ", err);
    process.exitCode = 1;
});
