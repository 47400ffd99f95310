// z32 ships plain CommonJS without type declarations.
declare module 'z32' {
  export function encode(data: Uint8Array | string): string
  export function decode(text: string, out?: Uint8Array): Uint8Array

  const z32: {
    encode: typeof encode
    decode: typeof decode
  }
  export default z32
}
