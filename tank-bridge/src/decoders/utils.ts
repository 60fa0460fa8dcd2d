export const startsWithAscii = (buf: Buffer, tag: string): boolean => {
  const prefix = Buffer.from(tag, 'ascii');
  return buf.length >= prefix.length && buf.subarray(0, prefix.length).equals(prefix);
};

export const readUInt32LE = (buf: Buffer, offset: number): number | null => {
  if (offset < 0 || buf.length < offset + 4) {
    return null;
  }
  return buf.readUInt32LE(offset);
};
