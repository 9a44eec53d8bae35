export type WasmCustomSection = {
  name: string;
  data: Uint8Array;
};

const WASM_HEADER = [0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00];

const encodeVarUint32 = (value: number): number[] => {
  const bytes: number[] = [];
  let remaining = value >>> 0;
  do {
    const chunk = remaining & 0x7f;
    remaining >>>= 7;
    bytes.push(remaining === 0 ? chunk : chunk | 0x80);
  } while (remaining !== 0);
  return bytes;
};

export const encodeCustomSection = ({ name, data }: WasmCustomSection): Uint8Array => {
  const nameBytes = new TextEncoder().encode(name);
  const nameLength = encodeVarUint32(nameBytes.length);
  const payloadLength = nameLength.length + nameBytes.length + data.length;
  const size = encodeVarUint32(payloadLength);

  const section = new Uint8Array(1 + size.length + payloadLength);
  let offset = 0;
  section[offset] = 0x00;
  offset += 1;
  section.set(size, offset);
  offset += size.length;
  section.set(nameLength, offset);
  offset += nameLength.length;
  section.set(nameBytes, offset);
  offset += nameBytes.length;
  section.set(data, offset);
  return section;
};

/** Custom sections may trail the module, so appending keeps the image valid. */
export const appendCustomSections = (
  image: Uint8Array,
  sections: readonly WasmCustomSection[]
): Uint8Array => {
  const encoded = sections.map(encodeCustomSection);
  const total = encoded.reduce((sum, bytes) => sum + bytes.length, image.length);
  const result = new Uint8Array(total);
  result.set(image, 0);
  let offset = image.length;
  encoded.forEach((bytes) => {
    result.set(bytes, offset);
    offset += bytes.length;
  });
  return result;
};

const readVarUint32 = (bytes: Uint8Array, start: number): { value: number; next: number } => {
  let value = 0;
  let shift = 0;
  let offset = start;
  for (;;) {
    const byte = bytes[offset];
    if (byte === undefined || shift > 28) {
      throw new Error(`malformed LEB128 value at offset ${start}`);
    }
    value |= (byte & 0x7f) << shift;
    offset += 1;
    if ((byte & 0x80) === 0) return { value: value >>> 0, next: offset };
    shift += 7;
  }
};

/** Lists the custom sections of a binary module in order of appearance. */
export const readCustomSections = (image: Uint8Array): WasmCustomSection[] => {
  const header = Array.from(image.subarray(0, WASM_HEADER.length));
  if (header.length !== WASM_HEADER.length || header.some((byte, index) => byte !== WASM_HEADER[index])) {
    throw new Error("not a WebAssembly binary module");
  }

  const sections: WasmCustomSection[] = [];
  let offset = WASM_HEADER.length;
  while (offset < image.length) {
    const id = image[offset];
    const size = readVarUint32(image, offset + 1);
    const end = size.next + size.value;
    if (end > image.length) throw new Error(`section at offset ${offset} overruns the module`);
    if (id === 0x00) {
      const nameLength = readVarUint32(image, size.next);
      const nameEnd = nameLength.next + nameLength.value;
      sections.push({
        name: new TextDecoder().decode(image.subarray(nameLength.next, nameEnd)),
        data: image.slice(nameEnd, end),
      });
    }
    offset = end;
  }
  return sections;
};
