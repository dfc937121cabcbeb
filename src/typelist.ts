import { ByteReader } from "./binary";

/**
 * type_list: u4 size followed by `size` u2 type indices.
 * Returns an empty list for offset 0.
 */
export function readTypeList(r: ByteReader, off: number): number[] {
  if (off === 0) return [];
  const size = r.u4(off);
  r.checkRange(off + 4, size * 2);

  const result: number[] = [];
  let cur = off + 4;
  for (let i = 0; i < size; i++) {
    result.push(r.u2(cur));
    cur += 2;
  }
  return result;
}
