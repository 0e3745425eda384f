import assert from 'node:assert/strict';
import test from 'node:test';

import { loadAppConfig } from '../src/config.js';

const createSource = (settings: Record<string, unknown>) => ({
  get(setting: string): unknown {
    if (!(setting in settings)) throw new Error(`Configuration property "${setting}" is not defined`);
    return settings[setting];
  },
});

test('loadAppConfig reads the test configuration files', () => {
  const appConfig = loadAppConfig();

  assert.equal(appConfig.app.name, 'DuckDuckGo Web Search');
  assert.equal(appConfig.app.version, '1.2.1');
  assert.equal(typeof appConfig.server.port, 'number');
});

test('loadAppConfig coerces a port given as a string', () => {
  const appConfig = loadAppConfig(
    createSource({
      server: { host: 'localhost', port: '9100' },
      app: { name: 'Search', version: '0.0.1' },
      logging: { namespaces: 'ddg-search:*' },
    })
  );

  assert.deepEqual(appConfig, {
    server: { host: 'localhost', port: 9100 },
    app: { name: 'Search', version: '0.0.1' },
    logging: { namespaces: 'ddg-search:*' },
  });
});

test('loadAppConfig rejects an out-of-range port', () => {
  assert.throws(() =>
    loadAppConfig(
      createSource({
        server: { host: 'localhost', port: 70000 },
        app: { name: 'Search', version: '0.0.1' },
        logging: { namespaces: '' },
      })
    )
  );
});
