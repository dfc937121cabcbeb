import { ByteReader } from "./binary";
import { DexError } from "./errors";

export const HEADER_SIZE = 0x70;
export const ENDIAN_CONSTANT = 0x12345678;
export const REVERSE_ENDIAN_CONSTANT = 0x78563412;
export const NO_INDEX = 0xffffffff;

export const STRING_ID_SIZE = 4;
export const TYPE_ID_SIZE = 4;
export const PROTO_ID_SIZE = 12;
export const FIELD_ID_SIZE = 8;
export const METHOD_ID_SIZE = 8;
export const CLASS_DEF_SIZE = 32;

export type DexHeader = {
  magic: string;
  version: number;
  checksum: number;
  signature: Uint8Array;
  fileSize: number;
  headerSize: number;
  endianTag: number;
  linkSize: number;
  linkOff: number;
  mapOff: number;
  stringIdsSize: number;
  stringIdsOff: number;
  typeIdsSize: number;
  typeIdsOff: number;
  protoIdsSize: number;
  protoIdsOff: number;
  fieldIdsSize: number;
  fieldIdsOff: number;
  methodIdsSize: number;
  methodIdsOff: number;
  classDefsSize: number;
  classDefsOff: number;
  dataSize: number;
  dataOff: number;
};

export type HeaderOptions = {
  verifyFileSize: boolean;
};

const MAGIC_PATTERN = /^dex\n0(\d{2})\0$/;

export function parseHeader(r: ByteReader, options: HeaderOptions = { verifyFileSize: true }): DexHeader {
  if (r.length < HEADER_SIZE) {
    throw new DexError("OutOfBounds", `file is ${r.length} bytes, shorter than the ${HEADER_SIZE}-byte header`, {
      offset: 0,
    });
  }

  // "dex\n035\0", "dex\n039\0", ...
  const magic = String.fromCharCode(...r.slice(0, 8));
  const m = MAGIC_PATTERN.exec(magic);
  if (!m) {
    throw new DexError("InvalidMagic", `invalid DEX magic: ${JSON.stringify(magic)}`, { offset: 0 });
  }

  const endianTag = r.u4(40);
  if (endianTag !== ENDIAN_CONSTANT) {
    const what = endianTag === REVERSE_ENDIAN_CONSTANT ? "big-endian files are not supported" : "unknown tag";
    throw new DexError("InvalidEndianTag", `bad endian tag 0x${endianTag.toString(16)}: ${what}`, { offset: 40 });
  }

  const header: DexHeader = {
    magic,
    version: Number.parseInt(m[1], 10),
    checksum: r.u4(8),
    signature: r.slice(12, 20),
    fileSize: r.u4(32),
    headerSize: r.u4(36),
    endianTag,
    linkSize: r.u4(44),
    linkOff: r.u4(48),
    mapOff: r.u4(52),
    stringIdsSize: r.u4(56),
    stringIdsOff: r.u4(60),
    typeIdsSize: r.u4(64),
    typeIdsOff: r.u4(68),
    protoIdsSize: r.u4(72),
    protoIdsOff: r.u4(76),
    fieldIdsSize: r.u4(80),
    fieldIdsOff: r.u4(84),
    methodIdsSize: r.u4(88),
    methodIdsOff: r.u4(92),
    classDefsSize: r.u4(96),
    classDefsOff: r.u4(100),
    dataSize: r.u4(104),
    dataOff: r.u4(108),
  };

  validateHeader(r, header, options);
  return header;
}

function validateHeader(r: ByteReader, h: DexHeader, options: HeaderOptions): void {
  if (h.headerSize !== HEADER_SIZE) {
    throw new DexError("InvalidHeader", `header_size is 0x${h.headerSize.toString(16)}, expected 0x70`, {
      offset: 36,
    });
  }

  if (options.verifyFileSize && h.fileSize !== r.length) {
    throw new DexError("InvalidHeader", `file_size mismatch: header=${h.fileSize} actual=${r.length}`, {
      offset: 32,
    });
  }

  checkTable(r, "string_ids", h.stringIdsSize, h.stringIdsOff, STRING_ID_SIZE);
  checkTable(r, "type_ids", h.typeIdsSize, h.typeIdsOff, TYPE_ID_SIZE);
  checkTable(r, "proto_ids", h.protoIdsSize, h.protoIdsOff, PROTO_ID_SIZE);
  checkTable(r, "field_ids", h.fieldIdsSize, h.fieldIdsOff, FIELD_ID_SIZE);
  checkTable(r, "method_ids", h.methodIdsSize, h.methodIdsOff, METHOD_ID_SIZE);
  checkTable(r, "class_defs", h.classDefsSize, h.classDefsOff, CLASS_DEF_SIZE);
  checkTable(r, "data", h.dataSize, h.dataOff, 1);
  checkTable(r, "link", h.linkSize, h.linkOff, 1);

  if (h.mapOff !== 0) {
    r.checkRange(h.mapOff, 4);
  }
}

function checkTable(r: ByteReader, name: string, size: number, off: number, stride: number): void {
  if (size === 0) return;
  if (off === 0) {
    throw new DexError("InvalidHeader", `${name} has ${size} entries but a zero offset`);
  }
  // size < 2^32 and stride <= 32, so the product stays an exact integer
  const byteLength = size * stride;
  if (!r.contains(off, byteLength)) {
    throw new DexError(
      "OutOfBounds",
      `${name} [0x${off.toString(16)}, +${byteLength}) lies outside the ${r.length}-byte file`,
      { offset: off }
    );
  }
}
