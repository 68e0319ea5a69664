import { randomUUID } from 'crypto';

/**
 * Generate a random unique identifier
 */
export function createId(): string {
  return randomUUID();
}

/**
 * Delay utility for async operations
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Validate if a string is a dotted-quad IPv4 address
 */
export function isValidIpv4(address: string): boolean {
  const ipv4Pattern = /^(\d{1,3}\.){3}\d{1,3}$/;

  if (!ipv4Pattern.test(address)) {
    return false;
  }

  const parts = address.split('.').map(Number);
  return parts.every(part => part >= 0 && part <= 255);
}

/**
 * Plain object check for values decoded from YAML or JSON
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep the last `maxLength` characters of process output
 */
export function tail(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(text.length - maxLength) : text;
}

/**
 * Errno code of a failed system call, if the value carries one
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
