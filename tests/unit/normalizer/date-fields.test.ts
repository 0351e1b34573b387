import { describe, it, expect } from 'vitest';
import {
  convertDatesBySchema,
  extractDateFieldPaths,
  isPlainObject,
} from '../../../src/lib/normalizer/date-fields.js';
import { normalizeCollectionDocuments } from '../../../src/lib/normalizer/index.js';

describe('extractDateFieldPaths', () => {
  it('should collect top-level date fields only', () => {
    const paths = extractDateFieldPaths({
      bsonType: 'object',
      properties: {
        enrollmentId: { bsonType: 'string' },
        enrollmentDate: { bsonType: 'date' },
        progress: { bsonType: 'double' },
      },
    });

    expect(paths).toEqual(new Set(['enrollmentDate']));
  });

  it('should join nested property paths with dots', () => {
    const paths = extractDateFieldPaths({
      properties: {
        profile: { properties: { joinedAt: { bsonType: 'date' } } },
      },
    });

    expect(paths).toEqual(new Set(['profile.joinedAt']));
  });

  it('should record a date node and still walk its nested properties', () => {
    const paths = extractDateFieldPaths({
      properties: {
        meta: {
          bsonType: 'date',
          properties: { reviewedAt: { bsonType: 'date' }, note: { bsonType: 'string' } },
        },
      },
    });

    expect(paths).toEqual(new Set(['meta', 'meta.reviewedAt']));
  });

  it('should tolerate malformed nodes without throwing', () => {
    const paths = extractDateFieldPaths({
      properties: {
        plain: 'string',
        empty: null,
        badChildren: { properties: 'not-an-object' },
        noType: {},
        createdAt: { bsonType: 'date' },
      },
    });

    expect(paths).toEqual(new Set(['createdAt']));
  });

  it('should only match the exact "date" type tag', () => {
    const paths = extractDateFieldPaths({
      properties: {
        maybeDate: { bsonType: ['date', 'null'] },
        timestamp: { bsonType: 'timestamp' },
      },
    });

    expect(paths.size).toBe(0);
  });

  it('should return an empty set when the schema has no properties', () => {
    expect(extractDateFieldPaths({ bsonType: 'object' }).size).toBe(0);
  });

  it('should return a fresh set on every call', () => {
    const schema = { properties: { dueDate: { bsonType: 'date' } } };

    expect(extractDateFieldPaths(schema)).not.toBe(extractDateFieldPaths(schema));
  });
});

describe('convertDatesBySchema', () => {
  const enrollmentDates = new Set(['enrollmentDate']);

  it('should convert an ISO string at a date path into a UTC Date', () => {
    const record = { enrollmentDate: '2023-05-01T00:00:00' };

    const result = convertDatesBySchema(record, enrollmentDates);

    expect(result.enrollmentDate).toBeInstanceOf(Date);
    expect(result.enrollmentDate).toEqual(new Date(Date.UTC(2023, 4, 1, 0, 0, 0)));
  });

  it('should mutate and return the same object', () => {
    const record = { enrollmentDate: '2023-05-01T00:00:00' };

    expect(convertDatesBySchema(record, enrollmentDates)).toBe(record);
  });

  it('should keep an unparseable date string unchanged', () => {
    const record = { enrollmentDate: 'not-a-date' };

    expect(() => convertDatesBySchema(record, enrollmentDates)).not.toThrow();
    expect(record.enrollmentDate).toBe('not-a-date');
  });

  it('should leave records without date strings untouched', () => {
    const record = {
      enrollmentId: 'e1',
      progress: 0.5,
      completed: false,
      tags: ['SQL', 'ETL'],
      profile: { bio: 'hello' },
    };
    const copy = structuredClone(record);

    convertDatesBySchema(record, enrollmentDates);

    expect(record).toEqual(copy);
  });

  it('should not convert ISO strings outside the date paths', () => {
    const record = { title: '2023-05-01T00:00:00' };

    convertDatesBySchema(record, enrollmentDates);

    expect(record.title).toBe('2023-05-01T00:00:00');
  });

  it('should convert nested fields using the dotted prefix', () => {
    const record = { profile: { joinedAt: '2024-01-02T03:04:05Z', bio: 'x' } };

    convertDatesBySchema(record, new Set(['profile.joinedAt']));

    expect(record.profile.joinedAt).toEqual(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));
    expect(record.profile.bio).toBe('x');
  });

  it('should not match a nested path against a top-level key', () => {
    const record = { createdAt: '2022-01-01T00:00:00' };

    convertDatesBySchema(record, new Set(['lessons.createdAt']));

    expect(record.createdAt).toBe('2022-01-01T00:00:00');
  });

  it('should walk mappings inside arrays and keep bad values', () => {
    const record = {
      lessons: [{ createdAt: '2022-01-01T00:00:00' }, { createdAt: 'bad' }],
    };

    convertDatesBySchema(record, new Set(['lessons.createdAt']));

    expect(record.lessons[0].createdAt).toEqual(new Date(Date.UTC(2022, 0, 1)));
    expect(record.lessons[1].createdAt).toBe('bad');
  });

  it('should pass non-mapping array elements through', () => {
    const record = {
      lessons: ['intro', 3, null, { createdAt: '2022-01-01' }],
    };

    convertDatesBySchema(record, new Set(['lessons.createdAt']));

    expect(record.lessons.slice(0, 3)).toEqual(['intro', 3, null]);
    expect(record.lessons[3]).toEqual({ createdAt: new Date(Date.UTC(2022, 0, 1)) });
  });

  it('should leave non-string values at date paths alone', () => {
    const record = { enrollmentDate: 1682899200000 };

    convertDatesBySchema(record, enrollmentDates);

    expect(record.enrollmentDate).toBe(1682899200000);
  });

  it('should be a no-op when applied to an already converted record', () => {
    const record = { enrollmentDate: '2023-05-01T00:00:00' };
    convertDatesBySchema(record, enrollmentDates);
    const converted = record.enrollmentDate;

    convertDatesBySchema(record, enrollmentDates);

    expect(record.enrollmentDate).toBe(converted);
  });

  it('should return non-mapping roots unchanged', () => {
    const list = [{ enrollmentDate: '2023-05-01T00:00:00' }];

    expect(convertDatesBySchema(list, enrollmentDates)).toBe(list);
    expect(list[0].enrollmentDate).toBe('2023-05-01T00:00:00');
    expect(convertDatesBySchema('2023-05-01', enrollmentDates)).toBe('2023-05-01');
    expect(convertDatesBySchema(null, enrollmentDates)).toBeNull();
  });
});

describe('isPlainObject', () => {
  it('should accept plain and null-prototype objects only', () => {
    expect(isPlainObject({ a: 1 })).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('text')).toBe(false);
  });
});

describe('normalizeCollectionDocuments', () => {
  it('should convert every document with the schema date paths', () => {
    const schema = {
      properties: {
        dueDate: { bsonType: 'date' },
        title: { bsonType: 'string' },
      },
    };
    const documents = [
      { assignmentId: 'a1', dueDate: '2025-05-01T23:59:00', title: 'Report' },
      { assignmentId: 'a2', dueDate: 'someday', title: 'Essay' },
    ];

    const result = normalizeCollectionDocuments(documents, schema);

    expect(result).toHaveLength(2);
    expect(result[0].dueDate).toEqual(new Date(Date.UTC(2025, 4, 1, 23, 59)));
    expect(result[1].dueDate).toBe('someday');
  });
});
