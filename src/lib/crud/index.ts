/**
 * CRUD operations over the platform collections
 *
 * Every operation logs driver errors and returns a neutral value instead of
 * throwing: `null` for inserts, `false` for updates and deletes. A write that
 * matches nothing is logged as a warning and also reported as `false`.
 */

import type { ObjectId } from "mongodb";
import type {
  CourseDocument,
  EnrollmentDocument,
  LessonDocument,
  NewStudent,
  SubmissionDocument,
  UserDocument,
  UserProfile,
} from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import type { EduHubCollections } from "../database/types.js";

/**
 * Insert a new student into the users collection; the role is always "student"
 */
export async function insertStudent(
  cols: EduHubCollections,
  data: NewStudent,
): Promise<ObjectId | null> {
  try {
    const student: UserDocument = { ...data, role: "student" };
    const result = await cols.users.insertOne(student);
    return result.insertedId;
  } catch (error) {
    logger.error("Unexpected error inserting student", error);
    return null;
  }
}

export async function insertCourse(
  cols: EduHubCollections,
  data: CourseDocument,
): Promise<ObjectId | null> {
  try {
    const result = await cols.courses.insertOne(data);
    return result.insertedId;
  } catch (error) {
    logger.error("Unexpected error inserting course", error);
    return null;
  }
}

/**
 * Enroll a student in a course.
 * Enrollment ids continue the `e<n>` sequence from the current document count.
 */
export async function registerStudent(
  cols: EduHubCollections,
  studentId: string,
  courseId: string,
  enrolledAt: Date = new Date(),
): Promise<ObjectId | null> {
  try {
    const count = await cols.enrollments.countDocuments({});
    const enrollment: EnrollmentDocument = {
      enrollmentId: `e${count + 1}`,
      studentId,
      courseId,
      enrollmentDate: enrolledAt,
      progress: 0,
      completed: false,
      certificateIssued: false,
    };
    const result = await cols.enrollments.insertOne(enrollment);
    return result.insertedId;
  } catch (error) {
    logger.error("Unexpected error registering student", error);
    return null;
  }
}

export async function insertLesson(
  cols: EduHubCollections,
  data: LessonDocument,
): Promise<ObjectId | null> {
  try {
    const result = await cols.lessons.insertOne(data);
    return result.insertedId;
  } catch (error) {
    logger.error("Unexpected error adding lesson", error);
    return null;
  }
}

/**
 * Replace a user's profile sub-document
 */
export async function modifyProfile(
  cols: EduHubCollections,
  userId: string,
  profile: UserProfile,
): Promise<boolean> {
  try {
    const result = await cols.users.updateOne({ userId }, { $set: { profile } });
    if (result.matchedCount === 0) {
      logger.warn(`No user found with userId: ${userId}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.error("Error updating profile", error);
    return false;
  }
}

export async function publishCourse(
  cols: EduHubCollections,
  courseId: string,
): Promise<boolean> {
  try {
    const result = await cols.courses.updateOne(
      { courseId },
      { $set: { isPublished: true } },
    );
    if (result.matchedCount === 0) {
      logger.warn(`No course found with courseId: ${courseId}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.error("Error publishing course", error);
    return false;
  }
}

/**
 * Grade a submission; feedback is only written when given
 */
export async function updateAssignmentGrade(
  cols: EduHubCollections,
  submissionId: string,
  grade: number,
  feedback?: string,
): Promise<boolean> {
  try {
    const updateFields: Pick<SubmissionDocument, "grade" | "feedback"> = { grade };
    if (feedback !== undefined) {
      updateFields.feedback = feedback;
    }
    const result = await cols.submissions.updateOne(
      { submissionId },
      { $set: updateFields },
    );
    if (result.matchedCount === 0) {
      logger.warn(`No submission found with submissionId: ${submissionId}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.error("Error updating assignment grade", error);
    return false;
  }
}

export async function addTagsToCourse(
  cols: EduHubCollections,
  courseId: string,
  tags: string[],
): Promise<boolean> {
  try {
    const result = await cols.courses.updateOne(
      { courseId },
      { $addToSet: { tags: { $each: tags } } },
    );
    if (result.matchedCount === 0) {
      logger.warn(`No course found with courseId: ${courseId}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.error("Error adding tags to course", error);
    return false;
  }
}

/**
 * Soft delete: the user stays but is marked inactive
 */
export async function deactivateUser(
  cols: EduHubCollections,
  userId: string,
): Promise<boolean> {
  try {
    const result = await cols.users.updateOne({ userId }, { $set: { isActive: false } });
    if (result.matchedCount === 0) {
      logger.warn(`No user found with userId: ${userId}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.error("Error deactivating user", error);
    return false;
  }
}

export async function deleteEnrollment(
  cols: EduHubCollections,
  enrollmentId: string,
): Promise<boolean> {
  try {
    const result = await cols.enrollments.deleteOne({ enrollmentId });
    if (result.deletedCount === 0) {
      logger.warn(`No enrollment found with enrollmentId: ${enrollmentId}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.error("Error deleting enrollment", error);
    return false;
  }
}

/**
 * Detach a lesson from its course by clearing the lesson's courseId
 */
export async function removeLessonFromCourse(
  cols: EduHubCollections,
  lessonId: string,
  courseId: string,
): Promise<boolean> {
  try {
    const result = await cols.lessons.updateOne(
      { lessonId, courseId },
      { $set: { courseId: "" } },
    );
    if (result.matchedCount === 0) {
      logger.warn(`No lesson found with lessonId: ${lessonId} in courseId: ${courseId}`);
      return false;
    }
    return true;
  } catch (error) {
    logger.error("Error removing lesson from course", error);
    return false;
  }
}
