import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  buildCollections,
  resetDatabase,
  seedDatabase,
  setupIndexes,
} from '../../../src/lib/database/setup.js';
import { SetupError } from '../../../src/utils/errors.js';
import { createFakeDb } from '../../helpers/fake-db.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  }
}));

const validators = {
  users: {
    $jsonSchema: {
      bsonType: 'object',
      properties: {
        userId: { bsonType: 'string' },
        dateJoined: { bsonType: 'date' },
      },
    },
  },
  lessons: {
    $jsonSchema: {
      bsonType: 'object',
      properties: { createdAt: { bsonType: 'date' } },
    },
  },
};

describe('database setup', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('resetDatabase', () => {
    it('should drop every existing collection', async () => {
      const { db, fake } = createFakeDb(['users', 'legacy_logs']);

      const dropped = await resetDatabase(db);

      expect(dropped).toEqual(['users', 'legacy_logs']);
      expect(fake.listCollections).toHaveBeenCalledWith({}, { nameOnly: true });
      expect(fake.dropCollection).toHaveBeenNthCalledWith(1, 'users');
      expect(fake.dropCollection).toHaveBeenNthCalledWith(2, 'legacy_logs');
    });

    it('should do nothing on an empty database', async () => {
      const { db, fake } = createFakeDb();

      await expect(resetDatabase(db)).resolves.toEqual([]);
      expect(fake.dropCollection).not.toHaveBeenCalled();
    });
  });

  describe('buildCollections', () => {
    it('should create one collection per validator', async () => {
      const { db, fake } = createFakeDb();

      const created = await buildCollections(db, validators);

      expect(created).toEqual(['users', 'lessons']);
      expect(fake.createCollection).toHaveBeenCalledWith('users', { validator: validators.users });
      expect(fake.createCollection).toHaveBeenCalledWith('lessons', {
        validator: validators.lessons,
      });
    });

    it('should raise SetupError naming the failed collection', async () => {
      const { db, fake } = createFakeDb();
      fake.createCollection
        .mockResolvedValueOnce(createFakeDb().get('users'))
        .mockRejectedValueOnce(new Error('collection already exists'));

      const error: unknown = await buildCollections(db, validators).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SetupError);
      expect(error).toMatchObject({
        message: "Error initializing database: could not create 'lessons'",
        details: { created: ['users'] },
      });
    });
  });

  describe('seedDatabase', () => {
    it('should convert dates and insert each known collection', async () => {
      const { db, get } = createFakeDb();
      const dataset = {
        users: [{ userId: 'u1', dateJoined: '2024-02-10T09:30:00' }],
        lessons: [],
      };

      const summary = await seedDatabase(db, dataset, validators);

      expect(summary).toEqual({ seeded: { users: 1, lessons: 0 }, skipped: [] });
      expect(get('users').insertMany).toHaveBeenCalledWith([
        { userId: 'u1', dateJoined: new Date(Date.UTC(2024, 1, 10, 9, 30)) },
      ]);
      expect(get('lessons').insertMany).not.toHaveBeenCalled();
    });

    it('should skip entries that are not lists or have no schema', async () => {
      const { db, get } = createFakeDb();
      const dataset = {
        notes: 'free text',
        courses: [{ courseId: 'c1' }],
        lessons: [],
      };

      const summary = await seedDatabase(db, dataset, validators);

      expect(summary).toEqual({ seeded: { lessons: 0 }, skipped: ['notes', 'courses'] });
      expect(get('courses').insertMany).not.toHaveBeenCalled();
    });

    it('should ignore entries that are not objects', async () => {
      const { db, get } = createFakeDb();
      const dataset = { users: ['u1', null, { userId: 'u2' }] };

      const summary = await seedDatabase(db, dataset, validators);

      expect(summary.seeded).toEqual({ users: 1 });
      expect(get('users').insertMany).toHaveBeenCalledWith([{ userId: 'u2' }]);
    });

    it('should keep unparseable dates as strings', async () => {
      const { db, get } = createFakeDb();

      await seedDatabase(db, { users: [{ userId: 'u1', dateJoined: 'yesterday' }] }, validators);

      expect(get('users').insertMany).toHaveBeenCalledWith([
        { userId: 'u1', dateJoined: 'yesterday' },
      ]);
    });

    it('should propagate insert failures', async () => {
      const { db, get } = createFakeDb();
      get('users').insertMany.mockRejectedValueOnce(new Error('Document failed validation'));

      await expect(
        seedDatabase(db, { users: [{ userId: 'u1' }] }, validators),
      ).rejects.toThrow('Document failed validation');
    });
  });

  describe('setupIndexes', () => {
    it('should create the query indexes', async () => {
      const { db, get } = createFakeDb();

      await expect(setupIndexes(db)).resolves.toBe(true);

      expect(get('users').createIndex).toHaveBeenCalledWith('email', { unique: true });
      expect(get('courses').createIndex).toHaveBeenCalledWith({ title: 'text' });
      expect(get('courses').createIndex).toHaveBeenCalledWith('category');
      expect(get('assignments').createIndex).toHaveBeenCalledWith('dueDate');
      expect(get('enrollments').createIndex).toHaveBeenCalledWith('studentId');
      expect(get('enrollments').createIndex).toHaveBeenCalledWith('courseId');
    });

    it('should return false when an index cannot be created', async () => {
      const { db, get } = createFakeDb();
      get('courses').createIndex.mockRejectedValueOnce(new Error('index build failed'));

      await expect(setupIndexes(db)).resolves.toBe(false);
      expect(get('assignments').createIndex).not.toHaveBeenCalled();
    });
  });
});
