/**
 * CursorCodec: Opaque Pagination Cursors for `interceptors/list`
 *
 * A cursor carries the id of the last interceptor on the previous page.
 * Clients must treat it as opaque; the server detects tampering.
 *
 * - `signed` (default): base64url payload plus HMAC-SHA256 signature.
 *   The payload is readable but cannot be altered.
 * - `encrypted`: AES-256-GCM. The payload is hidden and authenticated.
 *
 * Without a configured secret a random key is generated per codec, so
 * cursors do not survive a restart.
 *
 * @module
 */
import { webcrypto } from 'node:crypto';
import { z } from 'zod';

type CryptoKey = webcrypto.CryptoKey;

export interface CursorPayload {
    /** Id of the last item on the previous page */
    readonly after: string;
}

export type CursorMode = 'signed' | 'encrypted';

export interface CursorCodecOptions {
    readonly mode?: CursorMode;
    /** Exactly 32 bytes once UTF-8 encoded */
    readonly secret?: string;
}

const CursorPayloadSchema = z.object({ after: z.string() }).strict();

function toBase64Url(bytes: ArrayBuffer | Uint8Array): string {
    return Buffer.from(bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes)).toString('base64url');
}

function fromBase64Url(text: string): Uint8Array {
    return new Uint8Array(Buffer.from(text, 'base64url'));
}

function parsePayload(bytes: ArrayBuffer | Uint8Array): CursorPayload | undefined {
    const text = new TextDecoder().decode(bytes);
    const parsed = CursorPayloadSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : undefined;
}

/** Split `a.b` into its two non-empty halves. */
function splitToken(cursor: string): [string, string] | undefined {
    const parts = cursor.split('.');
    if (parts.length !== 2) return undefined;
    const [head, tail] = parts;
    if (!head || !tail) return undefined;
    return [head, tail];
}

export class CursorCodec {
    private readonly _mode: CursorMode;
    private readonly _secret: Uint8Array;
    private _hmacKey?: Promise<CryptoKey>;
    private _aesKey?: Promise<CryptoKey>;

    /** @throws Error when `secret` is not 32 bytes */
    constructor(options: CursorCodecOptions = {}) {
        this._mode = options.mode ?? 'signed';
        if (options.secret !== undefined) {
            const bytes = new TextEncoder().encode(options.secret);
            if (bytes.length !== 32) {
                throw new Error(`Cursor secret must be exactly 32 bytes, got ${bytes.length}.`);
            }
            this._secret = bytes;
        } else {
            this._secret = webcrypto.getRandomValues(new Uint8Array(32));
        }
    }

    get mode(): CursorMode {
        return this._mode;
    }

    private hmacKey(): Promise<CryptoKey> {
        this._hmacKey ??= webcrypto.subtle.importKey(
            'raw', this._secret, { name: 'HMAC', hash: 'SHA-256' }, false, ['sign', 'verify'],
        );
        return this._hmacKey;
    }

    private aesKey(): Promise<CryptoKey> {
        this._aesKey ??= webcrypto.subtle.importKey(
            'raw', this._secret, 'AES-GCM', false, ['encrypt', 'decrypt'],
        );
        return this._aesKey;
    }

    async encode(payload: CursorPayload): Promise<string> {
        const data = new TextEncoder().encode(JSON.stringify({ after: payload.after }));

        if (this._mode === 'encrypted') {
            const iv = webcrypto.getRandomValues(new Uint8Array(12));
            const sealed = await webcrypto.subtle.encrypt({ name: 'AES-GCM', iv }, await this.aesKey(), data);
            return `${toBase64Url(iv)}.${toBase64Url(sealed)}`;
        }

        const signature = await webcrypto.subtle.sign('HMAC', await this.hmacKey(), data);
        return `${toBase64Url(data)}.${toBase64Url(signature)}`;
    }

    /**
     * Verify and decode a cursor.
     * Returns `undefined` for a malformed, tampered or foreign cursor.
     */
    async decode(cursor: string): Promise<CursorPayload | undefined> {
        const parts = splitToken(cursor);
        if (!parts) return undefined;
        const [head, tail] = parts;

        try {
            if (this._mode === 'encrypted') {
                const opened = await webcrypto.subtle.decrypt(
                    { name: 'AES-GCM', iv: fromBase64Url(head) },
                    await this.aesKey(),
                    fromBase64Url(tail),
                );
                return parsePayload(opened);
            }

            const data = fromBase64Url(head);
            const valid = await webcrypto.subtle.verify('HMAC', await this.hmacKey(), fromBase64Url(tail), data);
            return valid ? parsePayload(data) : undefined;
        } catch {
            // authentication failure, bad IV length or non-JSON payload
            return undefined;
        }
    }
}
