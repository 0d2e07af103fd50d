const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

/** 64-bit FNV-1a over the UTF-8 bytes of `value`, as lowercase hex. */
export function stableHash(value: string): string {
    let hash = FNV_OFFSET_BASIS;
    for (const byte of Buffer.from(value, 'utf8')) {
        hash ^= BigInt(byte);
        hash = (hash * FNV_PRIME) & MASK_64;
    }
    return hash.toString(16).padStart(16, '0');
}
