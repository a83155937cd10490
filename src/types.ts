export interface RetentionConfig {
  /** Maximum characters (code points) per text */
  maxLength: number;
  /** Days a text stays readable */
  dayspan: number;
}

export interface TextMetadata {
  id: string;
  createdAt: Date;
  expiresAt: Date;
}

export interface StoreResponse {
  id: string;
  created: string;
  expires: string;
}

export interface TextResponse extends StoreResponse {
  content: string;
}

export const NONCE_LENGTH = 12;
export const KEY_LENGTH = 32;
export const TAG_LENGTH = 16;
export const MIN_SECRET_LENGTH = 32;

export const DAY_MS = 24 * 60 * 60 * 1000;
