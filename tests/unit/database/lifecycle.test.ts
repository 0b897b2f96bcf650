/**
 * Unit tests for DatabaseService lifecycle: create, open, openOrCreate, exists
 *
 * @module tests/unit/database/lifecycle
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, statSync } from 'fs';
import { join } from 'path';

import {
  DatabaseError,
  DatabaseErrorCode,
  DatabaseService,
} from '../../../src/services/storage/index.js';
import { cleanupTestDir, createTestDir, createUniqueName } from '../helpers.js';
import { personUpsert } from './fixtures.js';

function codeOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error instanceof DatabaseError ? error.code : error;
  }
  return undefined;
}

describe('DatabaseService lifecycle', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTestDir('lifecycle-');
  });

  afterEach(() => {
    cleanupTestDir(dir);
  });

  it('creates the file with owner-only permissions', () => {
    const name = createUniqueName('db');
    const db = DatabaseService.create(name, dir);
    db.close();

    const path = join(dir, `${name}.db`);
    expect(existsSync(path)).toBe(true);
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(DatabaseService.exists(name, dir)).toBe(true);
  });

  it('refuses to create a database twice', () => {
    const name = createUniqueName('db');
    DatabaseService.create(name, dir).close();
    expect(codeOf(() => DatabaseService.create(name, dir))).toBe(
      DatabaseErrorCode.DATABASE_ALREADY_EXISTS
    );
  });

  it('reopens a database with its rows intact', () => {
    const name = createUniqueName('db');
    const created = DatabaseService.create(name, dir);
    created.upsertPerson(personUpsert('John Smith'));
    created.close();

    const reopened = DatabaseService.open(name, dir);
    try {
      expect(reopened.getPersonByKey('john smith')?.full_name).toBe('John Smith');
    } finally {
      reopened.close();
    }
  });

  it('fails to open a missing database', () => {
    expect(codeOf(() => DatabaseService.open('missing', dir))).toBe(
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
  });

  it('openOrCreate creates on first use and opens afterwards', () => {
    const name = createUniqueName('db');
    const first = DatabaseService.openOrCreate(name, dir);
    first.upsertPerson(personUpsert('Robert Hale'));
    first.close();

    const second = DatabaseService.openOrCreate(name, dir);
    try {
      expect(second.getStats().total_persons).toBe(1);
    } finally {
      second.close();
    }
  });

  it('rejects names outside [A-Za-z0-9_-]', () => {
    expect(codeOf(() => DatabaseService.create('../escape', dir))).toBe(
      DatabaseErrorCode.INVALID_NAME
    );
    expect(codeOf(() => DatabaseService.create('', dir))).toBe(DatabaseErrorCode.INVALID_NAME);
    expect(DatabaseService.exists('bad name', dir)).toBe(false);
  });

  it('rolls back every write in a failed transaction', () => {
    const db = DatabaseService.create(createUniqueName('db'), dir);
    try {
      expect(() =>
        db.transaction(() => {
          db.upsertPerson(personUpsert('John Smith'));
          throw new Error('abort');
        })
      ).toThrow('abort');
      expect(db.getPersonByKey('john smith')).toBeNull();
    } finally {
      db.close();
    }
  });
});
