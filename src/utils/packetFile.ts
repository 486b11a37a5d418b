import { z } from 'zod';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const packetFileSchema = z.union([
  z.array(z.string().regex(BASE64_PATTERN, 'packet must be base64')),
  z.object({
    packets: z.array(z.string().regex(BASE64_PATTERN, 'packet must be base64')),
  }),
]);

/**
 * Reads a packet dump: either a JSON array of base64 Opus packets or `{ "packets": [...] }`.
 */
export function parsePacketFile(raw: string): Buffer[] {
  const parsed = packetFileSchema.parse(JSON.parse(raw));
  const packets = Array.isArray(parsed) ? parsed : parsed.packets;
  return packets.map((packet) => Buffer.from(packet, 'base64'));
}
