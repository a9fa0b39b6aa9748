/**
 * Pull side of a byte stream.
 *
 * `read` fills the start of `buffer` and resolves with the number of bytes written,
 * which may be 0. It resolves with `null` once the stream has ended for good.
 */
export interface Source {
    read(buffer:Buffer):Promise<number|null>;
}
