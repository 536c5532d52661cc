/**
 * H.264 码流分帧工具
 * 虚拟屏幕进程可能发送 AVCC（4 字节长度前缀）或 Annex-B（起始码）格式
 */

const START_CODE = Buffer.from([0x00, 0x00, 0x00, 0x01]);

export const NAL_TYPE_IDR = 5;
export const NAL_TYPE_SPS = 7;
export const NAL_TYPE_PPS = 8;

export function hasStartCode(bytes: Uint8Array): boolean {
  if (bytes.length < 4) return false;
  if (bytes[0] === 0 && bytes[1] === 0 && bytes[2] === 0 && bytes[3] === 1) return true;
  return bytes[0] === 0 && bytes[1] === 0 && bytes[2] === 1;
}

/**
 * AVCC → Annex-B；已是 Annex-B 或长度字段不合法时原样返回
 * 对输出再次调用结果不变
 */
export function maybeConvertFraming(bytes: Buffer): Buffer {
  if (bytes.length < 4 || hasStartCode(bytes)) {
    return bytes;
  }

  const out: Buffer[] = [];
  let offset = 0;

  while (offset + 4 <= bytes.length) {
    const length = bytes.readUInt32BE(offset);
    offset += 4;
    if (length <= 0 || offset + length > bytes.length) {
      return bytes;
    }
    out.push(START_CODE, bytes.subarray(offset, offset + length));
    offset += length;
  }

  if (out.length === 0) {
    return bytes;
  }

  return Buffer.concat(out);
}

/**
 * 第一个起始码之后的 NAL 类型（低 5 位），找不到返回 -1
 */
export function findNalUnitType(packet: Uint8Array): number {
  for (let i = 0; i + 3 < packet.length; i++) {
    if (packet[i] !== 0 || packet[i + 1] !== 0) continue;

    if (packet[i + 2] === 1) {
      return packet[i + 3] & 0x1f;
    }
    if (packet[i + 2] === 0 && packet[i + 3] === 1 && i + 4 < packet.length) {
      return packet[i + 4] & 0x1f;
    }
  }
  return -1;
}
