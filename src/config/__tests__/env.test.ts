/**
 * Environment configuration tests
 */

import { loadEnv } from '../env';
import { USER_AGENT } from '../constants';

describe('loadEnv', () => {
  it('falls back to defaults', () => {
    expect(loadEnv({})).toEqual({
      logLevel: 'info',
      logPretty: false,
      userAgent: USER_AGENT,
      db: {
        host: 'localhost',
        port: 3306,
        user: 'crawler',
        password: '',
        database: 'crawler_db',
      },
    });
  });

  it('reads overrides', () => {
    const env = loadEnv({
      LOG_LEVEL: 'debug',
      LOG_PRETTY: 'true',
      CRAWLER_USER_AGENT: 'test-agent',
      MYSQL_HOST: 'db',
      MYSQL_PORT: '3307',
      MYSQL_USER: 'tester',
      MYSQL_PASSWORD: 'test-secret',
      MYSQL_DATABASE: 'crawl_test',
    });

    expect(env.logLevel).toBe('debug');
    expect(env.logPretty).toBe(true);
    expect(env.userAgent).toBe('test-agent');
    expect(env.db).toEqual({
      host: 'db',
      port: 3307,
      user: 'tester',
      password: 'test-secret',
      database: 'crawl_test',
    });
  });

  it('ignores an unusable port', () => {
    expect(loadEnv({ MYSQL_PORT: 'abc' }).db.port).toBe(3306);
  });
});
