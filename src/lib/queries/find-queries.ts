/**
 * Read queries over users, courses, enrollments and assignments
 * Errors are logged and reported as an empty result.
 */

import { addMilliseconds, subMilliseconds } from "date-fns";
import type { WithId } from "mongodb";
import type {
  AssignmentDocument,
  CourseDocument,
  CourseWithInstructor,
  UserDocument,
} from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import type { EduHubCollections } from "../database/types.js";
import { courseDetailsPipeline } from "../aggregations/pipelines.js";

// Fixed-length windows; calendar arithmetic would drift an hour across DST
const DAY_MS = 24 * 60 * 60 * 1000;
const WEEK_MS = 7 * DAY_MS;

/**
 * Escape regex metacharacters so user input matches literally
 */
export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export async function getActiveStudents(
  cols: EduHubCollections,
): Promise<WithId<UserDocument>[]> {
  try {
    return await cols.users.find({ role: "student", isActive: true }).toArray();
  } catch (error) {
    logger.error("Error fetching active students", error);
    return [];
  }
}

/**
 * Courses joined with their instructor's user document
 */
export async function getCourseDetails(
  cols: EduHubCollections,
): Promise<CourseWithInstructor[]> {
  try {
    return await cols.courses.aggregate<CourseWithInstructor>(courseDetailsPipeline()).toArray();
  } catch (error) {
    logger.error("Error fetching course details", error);
    return [];
  }
}

export async function getCoursesByCategory(
  cols: EduHubCollections,
  category: string,
): Promise<WithId<CourseDocument>[]> {
  try {
    return await cols.courses.find({ category }).toArray();
  } catch (error) {
    logger.error("Error fetching courses by category", error);
    return [];
  }
}

export async function getStudentsEnrolledInCourse(
  cols: EduHubCollections,
  courseId: string,
): Promise<WithId<UserDocument>[]> {
  try {
    const enrollments = await cols.enrollments.find({ courseId }).toArray();
    const studentIds = enrollments.map((enrollment) => enrollment.studentId);
    return await cols.users.find({ userId: { $in: studentIds } }).toArray();
  } catch (error) {
    logger.error("Error fetching students enrolled to course", error);
    return [];
  }
}

/**
 * Case-insensitive partial match on the course title
 */
export async function searchCoursesByTitle(
  cols: EduHubCollections,
  title: string,
): Promise<WithId<CourseDocument>[]> {
  try {
    return await cols.courses
      .find({ title: { $regex: escapeRegex(title), $options: "i" } })
      .toArray();
  } catch (error) {
    logger.error("Error searching courses by title", error);
    return [];
  }
}

/**
 * Courses priced within [minPrice, maxPrice]
 */
export async function getCoursesByPriceRange(
  cols: EduHubCollections,
  minPrice: number,
  maxPrice: number,
): Promise<WithId<CourseDocument>[]> {
  try {
    return await cols.courses
      .find({ price: { $gte: minPrice, $lte: maxPrice } })
      .toArray();
  } catch (error) {
    logger.error("Error fetching courses by price", error);
    return [];
  }
}

/**
 * Users who joined within the last `months` months (30 days each)
 */
export async function getRecentSignups(
  cols: EduHubCollections,
  months = 6,
  now: Date = new Date(),
): Promise<WithId<UserDocument>[]> {
  try {
    const cutoff = subMilliseconds(now, 30 * months * DAY_MS);
    return await cols.users.find({ dateJoined: { $gte: cutoff } }).toArray();
  } catch (error) {
    logger.error("Error fetching recent signups", error);
    return [];
  }
}

/**
 * Courses carrying at least one of the given tags
 */
export async function getCoursesWithTags(
  cols: EduHubCollections,
  tags: string[],
): Promise<WithId<CourseDocument>[]> {
  try {
    return await cols.courses.find({ tags: { $in: tags } }).toArray();
  } catch (error) {
    logger.error("Error fetching courses with keywords", error);
    return [];
  }
}

/**
 * Assignments due between now and `weeks` weeks from now
 */
export async function getUpcomingAssignments(
  cols: EduHubCollections,
  weeks = 1,
  now: Date = new Date(),
): Promise<WithId<AssignmentDocument>[]> {
  try {
    const until = addMilliseconds(now, weeks * WEEK_MS);
    return await cols.assignments
      .find({ dueDate: { $gte: now, $lte: until } })
      .toArray();
  } catch (error) {
    logger.error("Error fetching upcoming assignments", error);
    return [];
  }
}
