/**
 * Core data model types for EduHub
 * Documents stored in the six platform collections, plus the row shapes
 * returned by the aggregation catalog.
 */

import type { ObjectId } from "mongodb";

export type UserRole = "student" | "instructor";

export type CourseLevel = "beginner" | "intermediate" | "advanced";

export interface UserProfile {
  bio?: string;
  avatar?: string;
  skills?: string[];
}

export interface UserDocument {
  _id?: ObjectId;
  userId: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  dateJoined: Date;
  profile?: UserProfile;
  isActive: boolean;
}

export interface CourseDocument {
  _id?: ObjectId;
  courseId: string;
  title: string;
  description?: string;
  instructorId: string;
  category: string;
  level: CourseLevel;
  duration?: number;
  price: number;
  tags: string[];
  rating?: number;
  createdAt: Date;
  updatedAt?: Date;
  isPublished: boolean;
}

export interface EnrollmentDocument {
  _id?: ObjectId;
  enrollmentId: string;
  studentId: string;
  courseId: string;
  enrollmentDate: Date;
  progress: number;
  completed: boolean;
  certificateIssued: boolean;
}

export interface LessonDocument {
  _id?: ObjectId;
  lessonId: string;
  courseId: string;
  title: string;
  content?: string;
  order: number;
  resources?: string[];
  duration?: number;
  createdAt: Date;
  updatedAt?: Date;
}

export interface AssignmentDocument {
  _id?: ObjectId;
  assignmentId: string;
  courseId: string;
  title: string;
  description?: string;
  dueDate: Date;
  maxScore: number;
  createdAt?: Date;
}

export interface SubmissionDocument {
  _id?: ObjectId;
  submissionId: string;
  assignmentId: string;
  studentId: string;
  submittedAt: Date;
  content?: string;
  grade?: number;
  feedback?: string;
}

/**
 * Student data accepted by insertStudent; the role is always forced to "student"
 */
export type NewStudent = Omit<UserDocument, "role">;

// Aggregation rows

export interface CourseWithInstructor extends CourseDocument {
  instructor: UserDocument;
}

export interface EnrollmentMetric {
  courseId: string;
  courseTitle: string;
  totalEnrollments: number;
}

export interface CourseRatingSummary {
  averageRating: number | null;
  count: number;
}

export interface CategoryGroup {
  category: string;
  courses: string[];
  averageRating: number | null;
  totalCourses: number;
}

export interface StudentGradeSummary {
  studentId: string;
  studentName: string;
  averageGrade: number | null;
  submissions: number;
}

export interface CourseCompletionRate {
  courseId: string;
  completionRate: number;
  totalEnrolled: number;
}

export interface InstructorStudentCount {
  instructorId: string;
  totalStudents: number;
  coursesTaught: string[];
}

export interface InstructorRating {
  instructorId: string;
  instructorName: string;
  averageRating: number | null;
  courses: string[];
}

export interface InstructorRevenue {
  instructorId: string;
  instructorName: string;
  revenue: number;
  courses: string[];
}

export interface MonthlyEnrollmentTrend {
  year: number;
  month: number;
  totalEnrollments: number;
}

export interface CategoryPopularity {
  category: string;
  totalCourses: number;
}

export interface StudentEngagement {
  studentId: string;
  studentName: string;
  totalSubmissions: number;
  averageGrade: number | null;
}
