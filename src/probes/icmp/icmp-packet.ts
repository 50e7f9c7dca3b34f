export const ICMP_ECHO_REQUEST = 8;
export const ICMP_ECHO_REPLY = 0;
const ICMP_HEADER_LENGTH = 8;

export const ECHO_PAYLOAD = Buffer.from('netprobe ICMP check', 'ascii');

/**
 * Internet checksum: one's complement of the one's complement sum of
 * big-endian 16-bit words. An odd trailing byte is the high byte of a
 * zero-padded word.
 */
export function icmpChecksum(data: Uint8Array): number {
  let sum = 0;
  for (let i = 0; i < data.length; i += 2) {
    const high = data[i] ?? 0;
    const low = data[i + 1] ?? 0;
    sum += (high << 8) + low;
  }

  while (sum > 0xffff) {
    sum = (sum >>> 16) + (sum & 0xffff);
  }
  return ~sum & 0xffff;
}

export function buildEchoRequest(identifier: number, sequence: number, payload: Buffer = ECHO_PAYLOAD): Buffer {
  const packet = Buffer.alloc(ICMP_HEADER_LENGTH + payload.length);
  packet.writeUInt8(ICMP_ECHO_REQUEST, 0);
  packet.writeUInt8(0, 1);
  packet.writeUInt16BE(0, 2);
  packet.writeUInt16BE(identifier & 0xffff, 4);
  packet.writeUInt16BE(sequence & 0xffff, 6);
  payload.copy(packet, ICMP_HEADER_LENGTH);

  packet.writeUInt16BE(icmpChecksum(packet), 2);
  return packet;
}

/** True for an echo reply carrying `expectedId`, given a packet that starts with its IPv4 header */
export function isEchoReply(packet: Buffer, expectedId: number): boolean {
  const versionAndIhl = packet[0];
  if (versionAndIhl === undefined) return false;

  const headerLength = (versionAndIhl & 0x0f) * 4;
  if (packet.length < headerLength + ICMP_HEADER_LENGTH) return false;

  return packet.readUInt8(headerLength) === ICMP_ECHO_REPLY && packet.readUInt16BE(headerLength + 4) === (expectedId & 0xffff);
}
