import { Buffer } from "node:buffer";
import { randomBytes } from "node:crypto";

export interface DecodedReference {
  prefix: string;
  userId: string;
  nonce: string;
}

const REFERENCE_PATTERN = /^([a-z0-9]+)-((?:[0-9a-f]{2})+)-([0-9a-z]+)$/;

export function createNonce(): string {
  return randomBytes(4).toString("hex");
}

export function referencePrefixFor(prefix: string, userId: string): string {
  return `${prefix}-${Buffer.from(userId, "utf-8").toString("hex")}-`;
}

export function encodeReference(prefix: string, userId: string, nonce: string): string {
  return `${referencePrefixFor(prefix, userId)}${nonce}`;
}

export function decodeReference(reference: string, prefix?: string): DecodedReference | null {
  const match = REFERENCE_PATTERN.exec(reference);
  if (!match) {
    return null;
  }

  const [, foundPrefix = "", hex = "", nonce = ""] = match;
  if (prefix !== undefined && foundPrefix !== prefix) {
    return null;
  }

  return {
    prefix: foundPrefix,
    userId: Buffer.from(hex, "hex").toString("utf-8"),
    nonce
  };
}

export function belongsToUser(reference: string, prefix: string, userId: string): boolean {
  return reference.startsWith(referencePrefixFor(prefix, userId));
}
