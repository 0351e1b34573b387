/**
 * Database module types
 */

import type { Collection } from "mongodb";
import type {
  AssignmentDocument,
  CourseDocument,
  EnrollmentDocument,
  LessonDocument,
  SubmissionDocument,
  UserDocument,
} from "../../types/data-model.js";

export interface MongoConnection {
  uri: string;
  database: string;
}

export interface EduHubCollections {
  users: Collection<UserDocument>;
  courses: Collection<CourseDocument>;
  enrollments: Collection<EnrollmentDocument>;
  lessons: Collection<LessonDocument>;
  assignments: Collection<AssignmentDocument>;
  submissions: Collection<SubmissionDocument>;
}

export type CollectionName = keyof EduHubCollections;

export interface SeedSummary {
  seeded: Record<string, number>;
  skipped: string[];
}
