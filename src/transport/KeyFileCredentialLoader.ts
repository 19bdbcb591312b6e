import { readFile } from 'fs/promises';
import { utils as ssh2Utils } from 'ssh2';
import { SessionError, describeError } from '../core/SessionError.js';
import { CredentialLoader, PrivateKeyCredential } from './RemoteShellTransport.js';

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Reads an unencrypted private key from disk and checks that ssh2 can parse
 * it. Passphrase-protected keys are rejected.
 */
export class KeyFileCredentialLoader implements CredentialLoader {
  async load(keyPath: string): Promise<PrivateKeyCredential> {
    let keyData: Buffer;
    try {
      keyData = await readFile(keyPath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new SessionError('KEY_NOT_FOUND', `Private key file not found: ${keyPath}`, error);
      }
      throw new SessionError('SSH_ERROR', `Invalid private key: ${describeError(error)}`, error);
    }

    const parsed = ssh2Utils.parseKey(keyData);
    if (parsed instanceof Error) {
      throw new SessionError('SSH_ERROR', `Invalid private key: ${parsed.message}`, parsed);
    }

    return { key: keyData, path: keyPath };
  }
}
