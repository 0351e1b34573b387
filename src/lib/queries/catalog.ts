/**
 * Named queries runnable from the CLI
 */

import { QueryError } from "../../utils/errors.js";
import {
  averageCourseRating,
  averageGradePerStudent,
  averageRatingPerInstructor,
  courseCompletionRate,
  enrollmentMetrics,
  groupCoursesByCategory,
  monthlyEnrollmentTrend,
  mostPopularCategories,
  revenuePerInstructor,
  studentEngagementMetrics,
  topPerformingStudents,
  totalStudentsPerInstructor,
} from "../aggregations/index.js";
import type { EduHubCollections } from "../database/types.js";
import {
  getActiveStudents,
  getCourseDetails,
  getCoursesByCategory,
  getCoursesByPriceRange,
  getCoursesWithTags,
  getRecentSignups,
  getStudentsEnrolledInCourse,
  getUpcomingAssignments,
  searchCoursesByTitle,
} from "./find-queries.js";
import type { CatalogQuery, CatalogQueryArgs } from "./types.js";

function required<K extends keyof CatalogQueryArgs>(
  args: CatalogQueryArgs,
  key: K,
  queryName: string,
): NonNullable<CatalogQueryArgs[K]> {
  const value = args[key];
  if (value === undefined || value === null) {
    throw new QueryError(`Query '${queryName}' requires --${toFlag(key)}`);
  }
  return value;
}

function toFlag(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

export const QUERY_CATALOG: Record<string, CatalogQuery> = {
  "active-students": {
    description: "Active students",
    run: (cols) => getActiveStudents(cols),
  },
  "course-details": {
    description: "Courses with instructor information",
    run: (cols) => getCourseDetails(cols),
  },
  "courses-by-category": {
    description: "Courses in a category (--category)",
    run: (cols, args) =>
      getCoursesByCategory(cols, required(args, "category", "courses-by-category")),
  },
  "enrolled-students": {
    description: "Students enrolled in a course (--course-id)",
    run: (cols, args) =>
      getStudentsEnrolledInCourse(cols, required(args, "courseId", "enrolled-students")),
  },
  "search-courses": {
    description: "Courses whose title contains --title (case-insensitive)",
    run: (cols, args) => searchCoursesByTitle(cols, required(args, "title", "search-courses")),
  },
  "courses-by-price": {
    description: "Courses priced between --min-price and --max-price",
    run: (cols, args) =>
      getCoursesByPriceRange(
        cols,
        required(args, "minPrice", "courses-by-price"),
        required(args, "maxPrice", "courses-by-price"),
      ),
  },
  "recent-signups": {
    description: "Users who joined in the last --months months (default 6)",
    run: (cols, args) => getRecentSignups(cols, args.months),
  },
  "courses-with-tags": {
    description: "Courses carrying any of --tags",
    run: (cols, args) => getCoursesWithTags(cols, required(args, "tags", "courses-with-tags")),
  },
  "upcoming-assignments": {
    description: "Assignments due within --weeks weeks (default 1)",
    run: (cols, args) => getUpcomingAssignments(cols, args.weeks),
  },
  "enrollment-metrics": {
    description: "Enrollments per course",
    run: (cols) => enrollmentMetrics(cols),
  },
  "average-rating": {
    description: "Average course rating",
    run: (cols) => averageCourseRating(cols),
  },
  "courses-grouped-by-category": {
    description: "Courses grouped by category",
    run: (cols) => groupCoursesByCategory(cols),
  },
  "average-grade-per-student": {
    description: "Average grade per student",
    run: (cols) => averageGradePerStudent(cols),
  },
  "completion-rate": {
    description: "Completion rate by course",
    run: (cols) => courseCompletionRate(cols),
  },
  "top-students": {
    description: "Top-performing students (--limit, default 5)",
    run: (cols, args) => topPerformingStudents(cols, args.limit),
  },
  "students-per-instructor": {
    description: "Distinct students taught by each instructor",
    run: (cols) => totalStudentsPerInstructor(cols),
  },
  "rating-per-instructor": {
    description: "Average course rating per instructor",
    run: (cols) => averageRatingPerInstructor(cols),
  },
  "revenue-per-instructor": {
    description: "Revenue generated per instructor",
    run: (cols) => revenuePerInstructor(cols),
  },
  "monthly-enrollments": {
    description: "Monthly enrollment trend",
    run: (cols) => monthlyEnrollmentTrend(cols),
  },
  "popular-categories": {
    description: "Most popular course categories (--limit, default 5)",
    run: (cols, args) => mostPopularCategories(cols, args.limit),
  },
  "student-engagement": {
    description: "Submissions and average grade per student",
    run: (cols) => studentEngagementMetrics(cols),
  },
};

/**
 * Run a catalog query by name
 * @throws QueryError for an unknown name or a missing argument
 */
export async function runCatalogQuery(
  cols: EduHubCollections,
  name: string,
  args: CatalogQueryArgs = {},
): Promise<unknown> {
  if (!Object.prototype.hasOwnProperty.call(QUERY_CATALOG, name)) {
    throw new QueryError(`Unknown query: ${name}`, {
      available: Object.keys(QUERY_CATALOG),
    });
  }
  return QUERY_CATALOG[name].run(cols, args);
}
