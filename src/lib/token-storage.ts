/**
 * Token Storage Module
 *
 * Process-lifetime storage for OAuth state values and tokens issued through the
 * callback. Entries are never evicted and are lost on restart; multi-instance
 * deployments need a shared implementation of `TokenStore`.
 */

import { randomBytes } from "node:crypto";
import type { TokenRecord } from "./schemas.js";
import { STATE_BYTES } from "./constants.js";

export interface OAuthStateEntry {
	type: "oauth_state";
	createdAt: number;
}

export interface IssuedTokenEntry {
	type: "token";
	tokenData: TokenRecord;
	expiresAt: number; // epoch ms
}

export type TokenStoreEntry = OAuthStateEntry | IssuedTokenEntry;

/**
 * Key-value storage for state markers (keyed by state) and issued tokens
 * (keyed by access token). Both kinds share one keyspace.
 */
export interface TokenStore {
	get(key: string): Promise<TokenStoreEntry | null>;
	put(key: string, entry: TokenStoreEntry): Promise<void>;
	has(key: string): Promise<boolean>;
	size(): Promise<number>;
}

/**
 * In-memory TokenStore. Concurrent writers are not coordinated; a later put for the
 * same key simply wins.
 */
export class MemoryTokenStore implements TokenStore {
	private entries = new Map<string, TokenStoreEntry>();

	async get(key: string): Promise<TokenStoreEntry | null> {
		return this.entries.get(key) ?? null;
	}

	async put(key: string, entry: TokenStoreEntry): Promise<void> {
		this.entries.set(key, entry);
	}

	async has(key: string): Promise<boolean> {
		return this.entries.has(key);
	}

	async size(): Promise<number> {
		return this.entries.size;
	}
}

/**
 * Generate a random URL-safe state value
 */
export function generateState(): string {
	return randomBytes(STATE_BYTES).toString("base64url");
}

/**
 * Mask sensitive data for display purposes
 *
 * @param value - The sensitive value
 * @returns Masked version showing only last 4 characters
 */
export function maskSecret(value: string): string {
	if (value.length <= 4) {
		return "****";
	}
	return `${"*".repeat(Math.min(value.length - 4, 20))}${value.slice(-4)}`;
}
