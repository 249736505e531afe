export enum EmitterState {
    IDLE = "idle",
    BROADCASTING = "broadcasting",
}
