import { SupabaseClient } from '@supabase/supabase-js';
import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { Env } from '../config/env';
import { supabase } from './supabase';

export interface StorageAdapter {
    upload(filename: string, buffer: Buffer, mimeType: string): Promise<string>;
    download(filename: string): Promise<Buffer>;
    list(): Promise<string[]>;
}

export class SupabaseAdapter implements StorageAdapter {
    constructor(private readonly client: SupabaseClient, private readonly bucket: string) {}

    async upload(filename: string, buffer: Buffer, mimeType: string): Promise<string> {
        const { data, error } = await this.client
            .storage
            .from(this.bucket)
            .upload(filename, buffer, { contentType: mimeType, upsert: true });

        if (error) throw error;
        return data.path;
    }

    async download(filename: string): Promise<Buffer> {
        const { data, error } = await this.client
            .storage
            .from(this.bucket)
            .download(filename);

        if (error) throw error;
        return Buffer.from(await data.arrayBuffer());
    }

    async list(): Promise<string[]> {
        const { data, error } = await this.client.storage.from(this.bucket).list();
        if (error) throw error;
        return data.map(entry => entry.name);
    }
}

export class LocalAdapter implements StorageAdapter {
    constructor(private readonly basePath: string = path.join(process.cwd(), 'local_vault')) {
        if (!fs.existsSync(this.basePath)) fs.mkdirSync(this.basePath, { recursive: true });
    }

    async upload(filename: string, buffer: Buffer): Promise<string> {
        const filePath = path.join(this.basePath, filename);
        await fs.promises.writeFile(filePath, buffer);
        return filePath;
    }

    async download(filename: string): Promise<Buffer> {
        const filePath = path.join(this.basePath, filename);
        if (!fs.existsSync(filePath)) throw new Error(`File not found: ${filename}`);
        return fs.promises.readFile(filePath);
    }

    async list(): Promise<string[]> {
        return fs.promises.readdir(this.basePath);
    }
}

const KEY_SALT = 'dispute-vault';
const IV_BYTES = 16;
const TAG_BYTES = 16;

/**
 * Encrypted file store. Payloads are AES-256-GCM sealed as iv | tag | ciphertext
 * and written under "<name>.enc".
 */
export class VaultService {
    private readonly encryptionKey: Buffer;

    constructor(private readonly adapter: StorageAdapter, secret: string) {
        this.encryptionKey = crypto.scryptSync(secret, KEY_SALT, 32);
    }

    private encrypt(buffer: Buffer): Buffer {
        const iv = crypto.randomBytes(IV_BYTES);
        const cipher = crypto.createCipheriv('aes-256-gcm', this.encryptionKey, iv);
        const encrypted = Buffer.concat([cipher.update(buffer), cipher.final()]);
        return Buffer.concat([iv, cipher.getAuthTag(), encrypted]);
    }

    private decrypt(buffer: Buffer): Buffer {
        const iv = buffer.subarray(0, IV_BYTES);
        const tag = buffer.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
        const encrypted = buffer.subarray(IV_BYTES + TAG_BYTES);
        const decipher = crypto.createDecipheriv('aes-256-gcm', this.encryptionKey, iv);
        decipher.setAuthTag(tag);
        return Buffer.concat([decipher.update(encrypted), decipher.final()]);
    }

    async storeFile(filename: string, fileBuffer: Buffer): Promise<{ filename: string; storedPath: string }> {
        const storedPath = await this.adapter.upload(`${filename}.enc`, this.encrypt(fileBuffer), 'application/octet-stream');
        console.log(`[Vault] Stored ${filename}`);
        return { filename, storedPath };
    }

    async retrieveFile(filename: string): Promise<Buffer> {
        const encrypted = await this.adapter.download(`${filename}.enc`);
        return this.decrypt(encrypted);
    }

    async storeJson(filename: string, value: unknown): Promise<void> {
        await this.storeFile(filename, Buffer.from(JSON.stringify(value, null, 2)));
    }

    async retrieveJson(filename: string): Promise<unknown> {
        const buffer = await this.retrieveFile(filename);
        return JSON.parse(buffer.toString('utf8'));
    }
}

export function createVaultService(config: Env): VaultService {
    let adapter: StorageAdapter;
    if (supabase) {
        console.log(`[Vault] Using Supabase storage bucket "${config.VAULT_BUCKET}"`);
        adapter = new SupabaseAdapter(supabase, config.VAULT_BUCKET);
    } else {
        console.log('[Vault] Using local storage');
        adapter = new LocalAdapter();
    }

    if (!config.VAULT_SECRET) {
        if (config.NODE_ENV === 'production') throw new Error('VAULT_SECRET is required in production');
        console.warn('[Vault] VAULT_SECRET not set, using the development key');
    }
    return new VaultService(adapter, config.VAULT_SECRET ?? 'local-development-secret');
}
