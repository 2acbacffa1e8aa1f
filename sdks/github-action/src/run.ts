import * as core from '@actions/core';
import { VezorClient, DEFAULT_BASE_URL } from '@vezor/sdk-node';

/**
 * Pull a Vezor group's secrets into the workflow: masked in logs, exported as
 * environment variables and set as step outputs.
 */
export async function run(): Promise<void> {
  try {
    const token = core.getInput('token', { required: true });
    const group = core.getInput('group', { required: true });
    const organizationId = core.getInput('organization-id') || undefined;
    const baseUrl = core.getInput('url') || DEFAULT_BASE_URL;
    const keysFilter = core.getInput('keys');
    const exportEnv = core.getInput('export-env') !== 'false';
    const mask = core.getInput('mask') !== 'false';

    core.info(`Pulling secrets from Vezor (group: ${group})`);

    const client = new VezorClient({ baseUrl, token, organizationId });
    const { secrets } = await client.pullGroupSecrets(group, 'json');

    let entries = Object.entries(secrets ?? {});
    if (keysFilter) {
      const wanted = new Set(keysFilter.split(',').map((k) => k.trim()));
      entries = entries.filter(([key]) => wanted.has(key));
    }

    core.info(`Found ${entries.length} secrets to inject`);

    for (const [key, value] of entries) {
      // Mask the value in logs
      if (mask) {
        core.setSecret(value);
      }

      if (exportEnv) {
        core.exportVariable(key, value);
      }

      core.setOutput(key, value);
    }

    core.setOutput('count', entries.length.toString());
    core.info(`Successfully injected ${entries.length} secrets`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}
