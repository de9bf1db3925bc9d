import { createLogger } from './logger.js';
import { formatError } from './errors.js';

const log = createLogger('Config');

/**
 * Load config from Google Secret Manager (if available) and merge into process.env.
 * Existing env vars take precedence. If Secret Manager is not configured or fails, we keep env-only.
 */
export async function loadConfigFromSecretManager(secretName: string): Promise<void> {
  const projectId = process.env.GOOGLE_CLOUD_PROJECT;
  if (!projectId) {
    return;
  }
  try {
    const { SecretManagerServiceClient } = await import('@google-cloud/secret-manager');
    const client = new SecretManagerServiceClient();
    const [version] = await client.accessSecretVersion({
      name: `projects/${projectId}/secrets/${secretName}/versions/latest`,
    });
    const payload = version.payload?.data;
    if (!payload) {
      return;
    }
    const data =
      typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
    const parsed: unknown = JSON.parse(data);
    if (typeof parsed !== 'object' || parsed === null) {
      log.warn('Secret payload is not a JSON object, ignoring', { secretName });
      return;
    }
    for (const [key, value] of Object.entries(parsed)) {
      const current = process.env[key];
      const unset = current === undefined || current === '';
      if (typeof value === 'string' && value !== '' && unset) {
        process.env[key] = value;
      }
    }
    log.info(`Loaded config from Secret Manager (${secretName})`);
  } catch (err) {
    const msg = formatError(err);
    if (msg.includes('NOT_FOUND') || msg.includes('Permission')) {
      log.info('Secret Manager not used (secret missing or no access). Using env only.');
    } else {
      log.warn('Secret Manager fetch failed', { error: msg });
    }
  }
}
