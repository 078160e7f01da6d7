import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { booleanRange, integerRange, stringRange } from '../range/combinators.js';
import { schema, section, setting } from './schema.js';

describe('schema', () => {
  const verbose = setting('verbose', 'Verbose output', booleanRange(false), { inherit: true });
  const host = setting('host', 'Database host', stringRange('localhost'));
  const database = schema('Database', host);
  const db = section('db', database);
  const retries = setting('retries', 'Retry count', integerRange(3));

  it('should default inherit to false', () => {
    expect(host.inherit).toBe(false);
    expect(db.inherit).toBe(false);
    expect(verbose.inherit).toBe(true);
    expect(section('db', database, { inherit: true }).inherit).toBe(true);
  });

  it('should partition settings and sections in declaration order', () => {
    const app = schema('App', verbose, db, retries);

    expect(app.description).toBe('App');
    expect(app.settings).toEqual([verbose, retries]);
    expect(app.sections).toEqual([db]);
    expect(app.settingsByKey.get('retries')).toBe(retries);
    expect(app.sectionsByKey.get('db')).toBe(db);
    expect(app.settingsByKey.has('db')).toBe(false);
  });

  it('should nest schemas through sections', () => {
    const app = schema('App', db);
    expect(app.sectionsByKey.get('db')?.schema.settingsByKey.get('host')).toBe(host);
  });

  it('should build immutable nodes', () => {
    const app = schema('App', verbose);
    expect(Object.isFrozen(app)).toBe(true);
    expect(Object.isFrozen(app.settings)).toBe(true);
    expect(Object.isFrozen(verbose)).toBe(true);
  });

  it('should reject a key declared twice', () => {
    let caught: unknown;
    try {
      schema('Broken', host, section('host', database));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: 'DUPLICATE_SCHEMA_KEY', details: { key: 'host', schema: 'Broken' } });
  });
});
