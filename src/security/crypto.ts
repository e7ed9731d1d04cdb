import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { z } from 'zod';

const envelopeSchema = z.object({
  v: z.literal(1),
  alg: z.literal('aes-256-gcm'),
  iv: z.string(),
  tag: z.string(),
  ct: z.string()
});

type EncryptedEnvelopeV1 = z.infer<typeof envelopeSchema>;

export interface EncryptionContext {
  seal(plaintext: string): Buffer;
  open(blob: Buffer): string;
}

function parseKey(raw: string): Buffer {
  const trimmed = raw.trim();
  if (/^[a-fA-F0-9]+$/.test(trimmed) && trimmed.length === 64) {
    return Buffer.from(trimmed, 'hex');
  }

  const base64 = Buffer.from(trimmed, 'base64');
  if (base64.length === 32) {
    return base64;
  }

  throw new Error('ENCRYPTION_KEY must be 32-byte base64 or 64-char hex');
}

/** AES-256-GCM envelopes for token columns. */
export function createEncryptionContext(rawKey: string): EncryptionContext {
  const key = parseKey(rawKey);

  return {
    seal(plaintext: string): Buffer {
      const iv = randomBytes(12);
      const cipher = createCipheriv('aes-256-gcm', key, iv);
      const ct = Buffer.concat([cipher.update(Buffer.from(plaintext, 'utf-8')), cipher.final()]);
      const tag = cipher.getAuthTag();

      const envelope: EncryptedEnvelopeV1 = {
        v: 1,
        alg: 'aes-256-gcm',
        iv: iv.toString('base64'),
        tag: tag.toString('base64'),
        ct: ct.toString('base64')
      };

      return Buffer.from(JSON.stringify(envelope), 'utf-8');
    },

    open(blob: Buffer): string {
      const parsed = envelopeSchema.safeParse(JSON.parse(blob.toString('utf-8')));
      if (!parsed.success) {
        throw new Error('Unsupported encrypted payload format');
      }

      const env = parsed.data;
      const decipher = createDecipheriv('aes-256-gcm', key, Buffer.from(env.iv, 'base64'));
      decipher.setAuthTag(Buffer.from(env.tag, 'base64'));
      return Buffer.concat([decipher.update(Buffer.from(env.ct, 'base64')), decipher.final()]).toString('utf-8');
    }
  };
}
