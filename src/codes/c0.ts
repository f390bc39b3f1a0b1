/**
 * C0 control characters (ECMA-48 5.2), plus SPACE and DELETE.
 */

export const C0 = {
  NUL: "\x00",
  SOH: "\x01",
  STX: "\x02",
  ETX: "\x03",
  EOT: "\x04",
  ENQ: "\x05",
  ACK: "\x06",
  BEL: "\x07",
  BS: "\x08",
  HT: "\x09",
  LF: "\x0a",
  VT: "\x0b",
  FF: "\x0c",
  CR: "\x0d",
  SO: "\x0e",
  SI: "\x0f",
  DLE: "\x10",
  DC1: "\x11",
  DC2: "\x12",
  DC3: "\x13",
  DC4: "\x14",
  NAK: "\x15",
  SYN: "\x16",
  ETB: "\x17",
  CAN: "\x18",
  EM: "\x19",
  SUB: "\x1a",
  ESC: "\x1b",
  IS4: "\x1c",
  IS3: "\x1d",
  IS2: "\x1e",
  IS1: "\x1f",
  // 7-bit names of the shifts and separators
  LS0: "\x0f",
  LS1: "\x0e",
  FS: "\x1c",
  GS: "\x1d",
  RS: "\x1e",
  US: "\x1f",
  SP: "\x20",
  DEL: "\x7f",
} as const;

export type C0Name = keyof typeof C0;
