export class SecureMemory {
    /** Overwrites key material in place. */
    static zeroize(array: Uint8Array): void {
        array.fill(0);
    }
}
