/**
 * Aggregation catalog - reporting queries over enrollments, courses and submissions
 */

import type { Collection, Document } from "mongodb";
import type {
  CategoryGroup,
  CategoryPopularity,
  CourseCompletionRate,
  CourseRatingSummary,
  EnrollmentMetric,
  InstructorRating,
  InstructorRevenue,
  InstructorStudentCount,
  MonthlyEnrollmentTrend,
  StudentEngagement,
  StudentGradeSummary,
} from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import type { EduHubCollections } from "../database/types.js";
import {
  averageCourseRatingPipeline,
  averageGradePerStudentPipeline,
  averageRatingPerInstructorPipeline,
  courseCompletionRatePipeline,
  coursesByCategoryPipeline,
  enrollmentMetricsPipeline,
  monthlyEnrollmentTrendPipeline,
  popularCategoriesPipeline,
  revenuePerInstructorPipeline,
  studentEngagementPipeline,
  studentsPerInstructorPipeline,
} from "./pipelines.js";

export * from "./pipelines.js";

const EMPTY_RATING: CourseRatingSummary = { averageRating: null, count: 0 };

async function runPipeline<TResult extends Document, TSchema extends Document>(
  collection: Collection<TSchema>,
  pipeline: Document[],
  description: string,
): Promise<TResult[]> {
  try {
    return await collection.aggregate<TResult>(pipeline).toArray();
  } catch (error) {
    logger.error(`Error calculating ${description}`, error);
    return [];
  }
}

export function enrollmentMetrics(cols: EduHubCollections): Promise<EnrollmentMetric[]> {
  return runPipeline(cols.enrollments, enrollmentMetricsPipeline(), "enrollment metrics");
}

/**
 * Average rating over all courses; `{ averageRating: null, count: 0 }` when
 * there are no courses or the query fails
 */
export async function averageCourseRating(
  cols: EduHubCollections,
): Promise<CourseRatingSummary> {
  const rows: CourseRatingSummary[] = await runPipeline(
    cols.courses,
    averageCourseRatingPipeline(),
    "average course rating",
  );
  return rows.length > 0 ? rows[0] : { ...EMPTY_RATING };
}

export function groupCoursesByCategory(cols: EduHubCollections): Promise<CategoryGroup[]> {
  return runPipeline(cols.courses, coursesByCategoryPipeline(), "courses by category");
}

export function averageGradePerStudent(
  cols: EduHubCollections,
): Promise<StudentGradeSummary[]> {
  return runPipeline(
    cols.submissions,
    averageGradePerStudentPipeline(),
    "average grade per student",
  );
}

export function courseCompletionRate(
  cols: EduHubCollections,
): Promise<CourseCompletionRate[]> {
  return runPipeline(
    cols.enrollments,
    courseCompletionRatePipeline(),
    "course completion rate",
  );
}

export function topPerformingStudents(
  cols: EduHubCollections,
  limit = 5,
): Promise<StudentGradeSummary[]> {
  return runPipeline(
    cols.submissions,
    averageGradePerStudentPipeline(limit),
    "top-performing students",
  );
}

export function totalStudentsPerInstructor(
  cols: EduHubCollections,
): Promise<InstructorStudentCount[]> {
  return runPipeline(
    cols.enrollments,
    studentsPerInstructorPipeline(),
    "total students by instructor",
  );
}

export function averageRatingPerInstructor(
  cols: EduHubCollections,
): Promise<InstructorRating[]> {
  return runPipeline(
    cols.courses,
    averageRatingPerInstructorPipeline(),
    "average course rating per instructor",
  );
}

export function revenuePerInstructor(cols: EduHubCollections): Promise<InstructorRevenue[]> {
  return runPipeline(
    cols.enrollments,
    revenuePerInstructorPipeline(),
    "revenue per instructor",
  );
}

export function monthlyEnrollmentTrend(
  cols: EduHubCollections,
): Promise<MonthlyEnrollmentTrend[]> {
  return runPipeline(
    cols.enrollments,
    monthlyEnrollmentTrendPipeline(),
    "monthly enrollment trends",
  );
}

export function mostPopularCategories(
  cols: EduHubCollections,
  limit = 5,
): Promise<CategoryPopularity[]> {
  return runPipeline(
    cols.courses,
    popularCategoriesPipeline(limit),
    "most popular course categories",
  );
}

export function studentEngagementMetrics(
  cols: EduHubCollections,
): Promise<StudentEngagement[]> {
  return runPipeline(
    cols.submissions,
    studentEngagementPipeline(),
    "student engagement metrics",
  );
}
