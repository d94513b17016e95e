import { execa } from 'execa';
import { userInfo } from 'os';
import { z } from 'zod';
import { CredentialsNotFoundError } from './errors.js';
import { logger } from './utils/logger.js';

export type ApiKeyResolver = () => Promise<string>;

const KEYCHAIN_SERVICE = 'Claude Code-credentials';

const KeychainEntrySchema = z.object({
  claudeAiOauth: z.object({ accessToken: z.string().min(1) }),
});

/**
 * Find the credential handed to the agent inside the VM:
 * CLAUDE_CODE_OAUTH_TOKEN, then ANTHROPIC_API_KEY, then the macOS keychain
 * entry written by `claude /login`.
 */
export async function resolveApiKey(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const fromEnv = env.CLAUDE_CODE_OAUTH_TOKEN || env.ANTHROPIC_API_KEY;
  if (fromEnv) {
    return fromEnv;
  }

  if (process.platform === 'darwin') {
    const fromKeychain = await readKeychainCredential(env.USER ?? userInfo().username);
    if (fromKeychain) {
      return fromKeychain;
    }
  }

  throw new CredentialsNotFoundError();
}

async function readKeychainCredential(account: string): Promise<string | null> {
  const result = await execa('security', ['find-generic-password', '-s', KEYCHAIN_SERVICE, '-a', account, '-w'], {
    reject: false,
  });

  if (result.exitCode !== 0) {
    logger.debug('No keychain credential found', { service: KEYCHAIN_SERVICE });
    return null;
  }

  return parseKeychainSecret(result.stdout.trim());
}

/**
 * The keychain entry is either the raw token or a JSON document holding
 * `claudeAiOauth.accessToken`.
 */
export function parseKeychainSecret(secret: string): string | null {
  if (!secret) {
    return null;
  }

  if (!secret.startsWith('{')) {
    return secret;
  }

  try {
    const parsed = KeychainEntrySchema.safeParse(JSON.parse(secret));
    return parsed.success ? parsed.data.claudeAiOauth.accessToken : secret;
  } catch {
    return secret;
  }
}
