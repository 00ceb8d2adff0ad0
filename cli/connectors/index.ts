import type { ConnectorSource } from './base/types.js';

export interface ConnectorEntry {
  source: ConnectorSource;
  displayName: string;
  /** String settings accepted as flags, env vars and config-file values. */
  credentials: readonly string[];
}

/**
 * Every connector the CLI knows. Structured settings (Fortress seasons,
 * `options` blocks) come from the config file only.
 */
export const CONNECTORS: Record<ConnectorSource, ConnectorEntry> = {
  'big-commerce': { source: 'big-commerce', displayName: 'BigCommerce', credentials: ['storeHash', 'apiToken'] },
  blinkfire: { source: 'blinkfire', displayName: 'Blinkfire', credentials: ['apiToken', 'entityId', 'entityGroup'] },
  bump: { source: 'bump', displayName: 'Bump', credentials: ['accessToken'] },
  cheq: { source: 'cheq', displayName: 'Cheq', credentials: ['apiKey'] },
  formstack: { source: 'formstack', displayName: 'Formstack', credentials: ['apiToken'] },
  fortress: {
    source: 'fortress',
    displayName: 'Fortress',
    credentials: ['apiKey', 'username', 'password', 'appId', 'agencyCode', 'timeZone'],
  },
  gameday: { source: 'gameday', displayName: 'Gameday', credentials: ['apiKey', 'baseUrl'] },
  gemini: { source: 'gemini', displayName: 'Gemini', credentials: ['apiKey', 'model'] },
  greenhouse: { source: 'greenhouse', displayName: 'Greenhouse', credentials: ['apiKey'] },
  mailchimp: { source: 'mailchimp', displayName: 'Mailchimp', credentials: ['apiKey'] },
  meta: {
    source: 'meta',
    displayName: 'Meta',
    credentials: ['appId', 'appSecret', 'accessToken', 'adAccountId', 'apiVersion'],
  },
  nhl: { source: 'nhl', displayName: 'NHL', credentials: ['baseUrl'] },
  'park-hub': {
    source: 'park-hub',
    displayName: 'ParkHub',
    credentials: ['username', 'password', 'apiKey', 'organizationId'],
  },
  seatgeek: { source: 'seatgeek', displayName: 'SeatGeek', credentials: ['clientId', 'clientSecret', 'bearerToken'] },
  'tradable-bits': { source: 'tradable-bits', displayName: 'Tradable Bits', credentials: ['apiKey', 'apiSecret'] },
  'yellow-dog': {
    source: 'yellow-dog',
    displayName: 'Yellow Dog',
    credentials: ['accessToken', 'username', 'password', 'clientId'],
  },
};

export function isConnectorSource(value: string): value is ConnectorSource {
  return Object.prototype.hasOwnProperty.call(CONNECTORS, value);
}

/** `storeHash` → `store-hash` */
export function flagName(key: string): string {
  return key.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`);
}

/** ('big-commerce', 'storeHash') → `BIG_COMMERCE_STORE_HASH` */
export function envVarName(source: ConnectorSource, key: string): string {
  return `${source}_${flagName(key)}`.replace(/-/g, '_').toUpperCase();
}
