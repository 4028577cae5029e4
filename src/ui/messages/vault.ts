/**
 * Messages for the vault commands.
 */

import { joinLines } from '@/ui/formatting.js';

export function keysWrittenMessage(publicKeyPath: string, privateKeyPath: string): string {
  return joinLines('Generated RSA key pair', `  Public:  ${publicKeyPath}`, `  Private: ${privateKeyPath}`);
}

export function keysExistError(privateKeyPath: string): string {
  return `Key files already exist (${privateKeyPath})`;
}

export function userRegisteredMessage(userName: string): string {
  return `Registered user "${userName}"`;
}

export function userRemovedMessage(userName: string): string {
  return `Removed user "${userName}" and all stored passwords`;
}

export function passwordStoredMessage(source: string): string {
  return `Stored password for "${source}"`;
}

export function passwordRemovedMessage(source: string): string {
  return `Removed password for "${source}"`;
}

/**
 * One source per line, or a note when there are none.
 */
export function sourcesListMessage(userName: string, sources: readonly string[]): string {
  if (sources.length === 0) {
    return `No passwords stored for "${userName}"`;
  }
  return joinLines(...sources);
}

export function loginRefusedError(userName: string): string {
  return `Login refused for "${userName}"`;
}

export function vaultRejectedError(operation: string, reason: string): string {
  return `Vault rejected ${operation}: ${reason}`;
}

export function noPasswordError(source: string): string {
  return `No password stored for "${source}"`;
}
