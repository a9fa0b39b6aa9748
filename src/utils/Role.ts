//Which end of the connection the reader sits on; decides the masking direction
enum Role {
    CLIENT = "client",
    SERVER = "server",
}

export default Role;
