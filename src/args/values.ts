import { isIP } from 'node:net';
import { InvalidArgumentError } from 'commander';
import { bech32m } from '@scure/base';
import { isHex, parseUnits } from 'viem';

/** Converts the raw text of an argument into its typed value, or throws InvalidArgumentError. */
export type ValueParser<T> = (raw: string) => T;

export const NATIVE_TOKEN_DECIMALS = 6;
export const MAX_U64 = 2n ** 64n - 1n;

export const ADDRESS_PREFIXES = ['mrd', 'tmrd'] as const;
export const SCHEME_TYPES = ['ed25519', 'secp256k1'] as const;
export const PROPOSAL_VOTES = ['yay', 'nay'] as const;
export const NODE_MODES = ['validator', 'full', 'seed'] as const;

export type SchemeType = (typeof SCHEME_TYPES)[number];
export type ProposalVote = (typeof PROPOSAL_VOTES)[number];
export type NodeMode = (typeof NODE_MODES)[number];

export interface StorageKey {
  segments: string[];
}

export type LedgerAddress =
  | { scheme: 'tcp'; peerId?: string; host: string; port: number }
  | { scheme: 'unix'; path: string };

export interface SocketAddress {
  host: string;
  port: number;
}

export function parseText(raw: string): string {
  if (raw.trim() === '') {
    throw new InvalidArgumentError('Value must not be empty.');
  }
  return raw;
}

export const parsePath: ValueParser<string> = parseText;

export function parseU64(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  const value = BigInt(raw);
  if (value > MAX_U64) {
    throw new InvalidArgumentError('Value exceeds the 64-bit range.');
  }
  return value;
}

/** Token amount in whole units, up to six fractional digits. Returns micro-units. */
export function parseAmount(raw: string): bigint {
  const match = /^\d+(?:\.(\d+))?$/.exec(raw);
  if (!match) {
    throw new InvalidArgumentError('Expected a non-negative decimal amount.');
  }
  if ((match[1]?.length ?? 0) > NATIVE_TOKEN_DECIMALS) {
    throw new InvalidArgumentError(`At most ${NATIVE_TOKEN_DECIMALS} decimal places are allowed.`);
  }
  const micro = parseUnits(raw, NATIVE_TOKEN_DECIMALS);
  if (micro > MAX_U64) {
    throw new InvalidArgumentError('Amount is too large.');
  }
  return micro;
}

export function parseDecimal(raw: string): string {
  if (!/^-?\d+(?:\.\d+)?$/.test(raw)) {
    throw new InvalidArgumentError('Expected a decimal number.');
  }
  return raw;
}

const CHAIN_ID_CHARS = /^[A-Za-z0-9._-]+$/;

export function parseChainId(raw: string): string {
  if (raw.length === 0 || raw.length > 50 || !CHAIN_ID_CHARS.test(raw)) {
    throw new InvalidArgumentError('Chain ID must be 1-50 characters of [A-Za-z0-9._-].');
  }
  return raw;
}

export function parseChainIdPrefix(raw: string): string {
  if (raw.length === 0 || raw.length > 19 || !CHAIN_ID_CHARS.test(raw)) {
    throw new InvalidArgumentError('Chain ID prefix must be 1-19 characters of [A-Za-z0-9._-].');
  }
  return raw;
}

/** True for a bech32m string carrying one of the network's address prefixes. */
export function isAddress(raw: string): boolean {
  const decoded = bech32m.decodeUnsafe(raw);
  return decoded ? ADDRESS_PREFIXES.some((prefix) => prefix === decoded.prefix) : false;
}

export function parseAddress(raw: string): string {
  if (!isAddress(raw)) {
    throw new InvalidArgumentError(
      `Expected a bech32m address with prefix ${ADDRESS_PREFIXES.join(' or ')}.`,
    );
  }
  return raw.toLowerCase();
}

/** Hex with a one-byte scheme tag: 00 = ed25519 (32 bytes), 01 = secp256k1 (33 bytes). */
export function isPublicKey(raw: string): boolean {
  const hex = raw.toLowerCase();
  if (!isHex(`0x${hex}`)) return false;
  return (hex.startsWith('00') && hex.length === 2 + 64) || (hex.startsWith('01') && hex.length === 2 + 66);
}

export function parsePublicKey(raw: string): string {
  if (!isPublicKey(raw)) {
    throw new InvalidArgumentError('Expected hex of 00 + 32 byte ed25519 key or 01 + 33 byte secp256k1 key.');
  }
  return raw.toLowerCase();
}

export function parseStorageKey(raw: string): StorageKey {
  const segments = raw.split('/');
  if (segments.some((segment) => segment === '')) {
    throw new InvalidArgumentError('Storage key segments must be non-empty.');
  }
  return { segments };
}

function parsePort(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidArgumentError(`Invalid port: ${raw}`);
  }
  const port = Number(raw);
  if (port < 1 || port > 65535) {
    throw new InvalidArgumentError(`Port out of range: ${raw}`);
  }
  return port;
}

/** `host:port`, with IPv6 hosts bracketed as in `[::1]:26657`. The brackets are dropped. */
function splitHostPort(raw: string): { host: string; port: number } {
  if (raw.startsWith('[')) {
    const close = raw.indexOf(']:');
    const host = raw.slice(1, close);
    if (close < 0 || isIP(host) !== 6) {
      throw new InvalidArgumentError('Expected [IPv6]:port.');
    }
    return { host, port: parsePort(raw.slice(close + 2)) };
  }
  const idx = raw.lastIndexOf(':');
  if (idx <= 0) {
    throw new InvalidArgumentError('Expected host:port.');
  }
  const host = raw.slice(0, idx);
  if (host.includes(':')) {
    throw new InvalidArgumentError(`IPv6 hosts must be bracketed, as in [${host}]:${raw.slice(idx + 1)}.`);
  }
  return { host, port: parsePort(raw.slice(idx + 1)) };
}

/** `[tcp://][peer@]host:port` or `unix://path`. */
export function parseLedgerAddress(raw: string): LedgerAddress {
  if (raw.startsWith('unix://')) {
    const path = raw.slice('unix://'.length);
    if (path === '') {
      throw new InvalidArgumentError('Unix socket path must not be empty.');
    }
    return { scheme: 'unix', path };
  }
  const rest = raw.startsWith('tcp://') ? raw.slice('tcp://'.length) : raw;
  const at = rest.indexOf('@');
  const peerId = at >= 0 ? rest.slice(0, at) : undefined;
  if (peerId !== undefined && !/^[0-9a-fA-F]{40}$/.test(peerId)) {
    throw new InvalidArgumentError('Peer ID must be 20 bytes of hex.');
  }
  const { host, port } = splitHostPort(at >= 0 ? rest.slice(at + 1) : rest);
  return peerId === undefined ? { scheme: 'tcp', host, port } : { scheme: 'tcp', peerId, host, port };
}

export function parseSocketAddress(raw: string): SocketAddress {
  const { host, port } = splitHostPort(raw);
  if (isIP(host) === 0) {
    throw new InvalidArgumentError(`Expected an IP address, got ${host}.`);
  }
  return { host, port };
}

/** `<n>ms` or `<n>s`, returned in milliseconds. */
export function parseTimeout(raw: string): number {
  const match = /^(\d+)(ms|s)$/.exec(raw);
  if (!match) {
    throw new InvalidArgumentError('Expected a duration such as 500ms or 1s.');
  }
  const amount = Number(match[1]);
  return match[2] === 's' ? amount * 1000 : amount;
}

export interface OneOfOptions {
  ignoreCase?: boolean;
}

/** Closed vocabulary; anything outside it is rejected. */
export function oneOf<const V extends readonly string[]>(
  values: V,
  { ignoreCase = false }: OneOfOptions = {},
): ValueParser<V[number]> {
  return (raw) => {
    const wanted = ignoreCase ? raw.toLowerCase() : raw;
    const found = values.find((value) => value === wanted);
    if (found === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${values.join(', ')}.`);
    }
    return found;
  };
}

export const parseScheme = oneOf(SCHEME_TYPES, { ignoreCase: true });
export const parseVote = oneOf(PROPOSAL_VOTES);
export const parseMode = oneOf(NODE_MODES);
