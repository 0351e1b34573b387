import type { Db } from "mongodb";
import type {
  AssignmentDocument,
  CourseDocument,
  EnrollmentDocument,
  LessonDocument,
  SubmissionDocument,
  UserDocument,
} from "../../types/data-model.js";
import type { EduHubCollections } from "./types.js";

export function getCollections(db: Db): EduHubCollections {
  return {
    users: db.collection<UserDocument>("users"),
    courses: db.collection<CourseDocument>("courses"),
    enrollments: db.collection<EnrollmentDocument>("enrollments"),
    lessons: db.collection<LessonDocument>("lessons"),
    assignments: db.collection<AssignmentDocument>("assignments"),
    submissions: db.collection<SubmissionDocument>("submissions"),
  };
}
