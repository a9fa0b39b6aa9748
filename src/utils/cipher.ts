/**
 * XORs `payload` in place with `maskingKey`, starting at key byte `offset % 4`.
 * Applying it twice with the same key and offset restores the input.
 */
function cipher(payload:Uint8Array, maskingKey:Uint8Array, offset = 0):void{

    const length = maskingKey.byteLength;

    payload.forEach((value:number, index:number) => {
        payload[index] = maskingKey[(offset + index) % length] ^ value;
    });
}

export default cipher;
