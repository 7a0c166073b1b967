/**
 * Server entry point.
 */

import { readFileSync } from 'fs';
import { SigningKey } from './auth/token-validator';
import { AuthConfig, ConfigError, ServerConfig, loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { logger, setLogLevel } from './logger';

function signingKeysFrom(auth: AuthConfig): SigningKey[] {
  const keys: SigningKey[] = [];
  if (auth.publicKeyFile) {
    keys.push({ alg: 'RS256', publicKey: readFileSync(auth.publicKeyFile, 'utf8') });
  }
  if (auth.hmacSecret) {
    keys.push({ alg: 'HS256', secret: auth.hmacSecret });
  }
  return keys;
}

function loadConfigOrExit(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', { problems: err.problems });
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const config = loadConfigOrExit();
  setLogLevel(config.logLevel);
  const keys = signingKeysFrom(config.auth);
  if (keys.length === 0) {
    logger.warn('No token signing keys configured; every authenticated call will be rejected');
  }

  const context = createAppContext({
    signingKeys: keys,
    issuer: config.auth.issuer,
    audience: config.auth.audience,
    eventsBufferSize: config.eventsBufferSize,
    defaultProviderName: config.defaultProviderName,
  });
  const app = createApp(context);

  app.listen(config.httpPort, () => {
    logger.info('Server listening', { port: config.httpPort });
  });
}

main();
