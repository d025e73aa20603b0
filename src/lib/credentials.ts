import type { ModelClient } from './types.js';
import { ConfigurationError } from './errors.js';
import { log } from './utils.js';

// ─── Credential Source ───────────────────────────────────────────────────────

export interface CredentialSource {
    env: Record<string, string | undefined>;
    /** Primary variable name; extra keys use `${prefix}_2` … `${prefix}_${maxKeys}`. */
    prefix: string;
    maxKeys: number;
}

const PLACEHOLDER_PREFIX = 'your_';

export function isUsableCredential(value: string | undefined): value is string {
    if (value === undefined) return false;
    const trimmed = value.trim();
    return trimmed.length > 0 && !trimmed.startsWith(PLACEHOLDER_PREFIX);
}

export function collectCredentials(source: CredentialSource): string[] {
    const names = [source.prefix];
    for (let i = 2; i <= source.maxKeys; i++) {
        names.push(`${source.prefix}_${i}`);
    }
    return names
        .map((name) => source.env[name])
        .filter(isUsableCredential)
        .map((value) => value.trim());
}

export function maskCredential(key: string): string {
    if (key.length <= 12) {
        return `${key.slice(0, 2)}...`;
    }
    return `${key.slice(0, 8)}...${key.slice(-4)}`;
}

// ─── Pool ────────────────────────────────────────────────────────────────────

/**
 * Ordered, immutable set of credentials with one client each. Selection is
 * plain round robin; keys are never dropped, a throttled key is expected to
 * recover during the engine's backoff.
 */
export class CredentialPool {
    private readonly credentials: readonly string[];
    private readonly clients: readonly ModelClient[];

    constructor(credentials: string[], clients: ModelClient[]) {
        if (credentials.length === 0) {
            throw new ConfigurationError('Credential pool needs at least one credential.');
        }
        if (credentials.length !== clients.length) {
            throw new ConfigurationError(
                `Credential pool got ${credentials.length} credential(s) but ${clients.length} client(s).`
            );
        }
        this.credentials = [...credentials];
        this.clients = [...clients];
    }

    static create(credentials: string[], createClient: (apiKey: string) => ModelClient): CredentialPool {
        return new CredentialPool(credentials, credentials.map((key) => createClient(key)));
    }

    /** A pool over ready-made clients, labelled client-1 … client-N. */
    static fromClients(clients: ModelClient[]): CredentialPool {
        return new CredentialPool(
            clients.map((_, i) => `client-${i + 1}`),
            clients
        );
    }

    get size(): number {
        return this.credentials.length;
    }

    nextAfter(index: number): number {
        return (index + 1) % this.credentials.length;
    }

    clientAt(index: number): ModelClient {
        const client = this.clients[index];
        if (!client) {
            throw new RangeError(`No credential at index ${index} (pool size ${this.size})`);
        }
        return client;
    }

    describe(index: number): string {
        const key = this.credentials[index];
        if (key === undefined) {
            throw new RangeError(`No credential at index ${index} (pool size ${this.size})`);
        }
        return `key ${index + 1}/${this.size} (${maskCredential(key)})`;
    }

    /** Same credentials and clients for a separate run; cursors are never shared. */
    snapshot(): CredentialPool {
        return new CredentialPool([...this.credentials], [...this.clients]);
    }
}

export function buildCredentialPool(
    source: CredentialSource,
    createClient: (apiKey: string) => ModelClient
): CredentialPool {
    const keys = collectCredentials(source);
    if (keys.length === 0) {
        throw new ConfigurationError(`No valid API keys found. Set ${source.prefix} in .env`);
    }

    log('info', `API key pool initialized with ${keys.length} key(s):`);
    keys.forEach((key, i) => {
        log('info', `  Key ${i + 1}: ${maskCredential(key)}`);
    });

    return CredentialPool.create(keys, createClient);
}
