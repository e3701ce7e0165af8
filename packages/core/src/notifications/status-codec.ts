import { SubscriptionStatusSchema, type SubscriptionStatus } from '@newsletter/types';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/** Raw UTF-8 bytes of the status token; no length prefix or framing */
export function encodeStatus(status: SubscriptionStatus): Uint8Array {
  return encoder.encode(status);
}

export function decodeStatus(payload: Uint8Array): SubscriptionStatus | null {
  const parsed = SubscriptionStatusSchema.safeParse(decoder.decode(payload));
  return parsed.success ? parsed.data : null;
}
