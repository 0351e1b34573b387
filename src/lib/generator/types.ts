/**
 * Generator module types
 */

import type {
  AssignmentDocument,
  CourseDocument,
  EnrollmentDocument,
  LessonDocument,
  SubmissionDocument,
  UserDocument,
} from "../../types/data-model.js";

export interface GeneratorOptions {
  seed?: string | number;
  /** Reference instant for relative dates ("joined in the last two years") */
  now?: Date;
}

export interface DatasetCounts {
  users: number;
  courses: number;
  lessonsPerCourse: number;
  assignmentsPerCourse: number;
  enrollmentsPerStudent: number;
}

export interface GeneratedDataset {
  users: UserDocument[];
  courses: CourseDocument[];
  enrollments: EnrollmentDocument[];
  lessons: LessonDocument[];
  assignments: AssignmentDocument[];
  submissions: SubmissionDocument[];
}
