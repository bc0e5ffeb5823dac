/**
 * Basic MisisClient usage
 *
 * Usage:
 *   npx tsx src/portal/examples/basic-usage.ts
 *
 * Environment:
 *   - MISIS_LOGIN: portal login
 *   - MISIS_PASSWORD: portal password
 */

import { loadConfig, loadEnv } from '../../shared/config.js';
import { settle } from '../../shared/errors.js';
import { createLogger } from '../../shared/utils/logger.js';
import { withMisisClient } from '../client.js';
import { formatStudentInfoText } from '../format.js';

async function main(): Promise<number> {
  loadEnv();
  const config = loadConfig();
  const logger = createLogger('example', { level: config.logLevel ?? 'info' });

  if (!config.login || !config.password) {
    logger.warn('Set MISIS_LOGIN and MISIS_PASSWORD (in .env or the environment) to run this example');
    return 1;
  }
  const { login, password } = config;

  const result = await settle(
    withMisisClient({ baseUrl: config.baseUrl, logger: logger.child('MisisClient') }, async client => {
      logger.info('🔐 Authenticating...');
      await client.authenticate(login, password);
      logger.info('✅ Authenticated');

      logger.info('📊 Fetching student info...');
      return client.getStudentInfo();
    })
  );

  if (!result.ok) {
    logger.error(`❌ ${result.error.kind}: ${result.error.message}`);
    return 1;
  }

  console.log(formatStudentInfoText(result.value));
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`💥 Failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
