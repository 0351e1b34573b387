import { describe, it, expect, vi, beforeEach } from 'vitest';
import { QUERY_CATALOG, runCatalogQuery } from '../../../src/lib/queries/catalog.js';
import { averageGradePerStudentPipeline } from '../../../src/lib/aggregations/pipelines.js';
import { QueryError } from '../../../src/utils/errors.js';
import { createFakeCollections, cursor } from '../../helpers/fake-db.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
  }
}));

describe('query catalog', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should list every named query', () => {
    expect(Object.keys(QUERY_CATALOG)).toEqual([
      'active-students',
      'course-details',
      'courses-by-category',
      'enrolled-students',
      'search-courses',
      'courses-by-price',
      'recent-signups',
      'courses-with-tags',
      'upcoming-assignments',
      'enrollment-metrics',
      'average-rating',
      'courses-grouped-by-category',
      'average-grade-per-student',
      'completion-rate',
      'top-students',
      'students-per-instructor',
      'rating-per-instructor',
      'revenue-per-instructor',
      'monthly-enrollments',
      'popular-categories',
      'student-engagement',
    ]);
  });

  it('should run a query with its arguments', async () => {
    const { fakes, cols } = createFakeCollections();
    const rows = [{ courseId: 'c1', category: 'SQL' }];
    fakes.courses.find.mockReturnValueOnce(cursor(rows));

    await expect(runCatalogQuery(cols, 'courses-by-category', { category: 'SQL' })).resolves.toEqual(
      rows,
    );
    expect(fakes.courses.find).toHaveBeenCalledWith({ category: 'SQL' });
  });

  it('should pass the limit through to ranked queries', async () => {
    const { fakes, cols } = createFakeCollections();

    await runCatalogQuery(cols, 'top-students', { limit: 3 });

    expect(fakes.submissions.aggregate).toHaveBeenCalledWith(averageGradePerStudentPipeline(3));
  });

  it('should name the missing flag', async () => {
    const { cols } = createFakeCollections();

    await expect(runCatalogQuery(cols, 'enrolled-students')).rejects.toThrow(
      "Query 'enrolled-students' requires --course-id",
    );
    await expect(runCatalogQuery(cols, 'courses-by-price', { minPrice: 10 })).rejects.toThrow(
      "Query 'courses-by-price' requires --max-price",
    );
  });

  it('should reject unknown query names with the available list', async () => {
    const { cols } = createFakeCollections();

    const error: unknown = await runCatalogQuery(cols, 'constructor').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toMatchObject({
      message: 'Unknown query: constructor',
      details: { available: Object.keys(QUERY_CATALOG) },
    });
  });
});
