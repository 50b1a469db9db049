export interface BomDescriptor {
  readonly signature: Uint8Array;
  readonly label: string;
}

/**
 * Byte-order marks in the order they are tested. The UTF-16 marks are two bytes
 * and neither is a prefix of the UTF-8 mark, so this order never lets one shadow another.
 */
export const UTF8_BOM = Uint8Array.of(0xef, 0xbb, 0xbf);

export const BOMS: readonly BomDescriptor[] = [
  { signature: Uint8Array.of(0xfe, 0xff), label: "utf-16be" },
  { signature: Uint8Array.of(0xff, 0xfe), label: "utf-16le" },
  { signature: UTF8_BOM, label: "utf-8" },
];

export function hasPrefix(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (bytes.length < prefix.length) {
    return false;
  }
  return prefix.every((value, index) => bytes[index] === value);
}

/**
 * Returns the byte-order mark `bytes` starts with, if any.
 */
export function matchBom(bytes: Uint8Array): BomDescriptor | undefined {
  return BOMS.find((bom) => hasPrefix(bytes, bom.signature));
}
