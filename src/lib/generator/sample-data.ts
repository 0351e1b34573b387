/**
 * Sample data generation with @faker-js/faker
 * Produces referentially consistent users, courses, lessons, enrollments,
 * assignments and submissions for seeding a development database.
 */

import { Faker, base, en } from "@faker-js/faker";
import { addDays, subDays, subYears } from "date-fns";
import type {
  AssignmentDocument,
  CourseDocument,
  CourseLevel,
  EnrollmentDocument,
  LessonDocument,
  SubmissionDocument,
  UserDocument,
  UserRole,
} from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";
import { toNumericSeed } from "../../utils/seed-manager.js";
import type { DatasetCounts, GeneratedDataset, GeneratorOptions } from "./types.js";

const ROLES: UserRole[] = ["student", "instructor"];

const SKILLS = [
  "Python",
  "SQL",
  "Data Engineering",
  "ETL",
  "JavaScript",
  "APIs",
  "Kubernetes",
  "Machine Learning",
  "MongoDB",
  "Cloud Computing",
];

const LEVELS: CourseLevel[] = ["beginner", "intermediate", "advanced"];

export const DEFAULT_DATASET_COUNTS: DatasetCounts = {
  users: 20,
  courses: 8,
  lessonsPerCourse: 3,
  assignmentsPerCourse: 2,
  enrollmentsPerStudent: 2,
};

export class SampleDataGenerator {
  private readonly faker: Faker;
  private readonly now: Date;

  constructor(options: GeneratorOptions = {}) {
    this.faker = new Faker({ locale: [en, base] });
    this.now = options.now ?? new Date();

    if (options.seed !== undefined) {
      const numericSeed = toNumericSeed(options.seed);
      this.faker.seed(numericSeed);
      logger.debug("Faker seed set", { seed: options.seed, numericSeed });
    }
  }

  private dateBetween(from: Date, to: Date): Date {
    return this.faker.date.between({ from, to });
  }

  makeUser(userId: string, role?: UserRole): UserDocument {
    return {
      userId,
      email: this.faker.internet.email(),
      firstName: this.faker.person.firstName(),
      lastName: this.faker.person.lastName(),
      role: role ?? this.faker.helpers.arrayElement(ROLES),
      dateJoined: this.dateBetween(subYears(this.now, 2), this.now),
      profile: {
        bio: this.faker.lorem.sentence(),
        avatar: this.faker.image.url(),
        skills: this.faker.helpers.arrayElements(SKILLS, 3),
      },
      isActive: this.faker.datatype.boolean(),
    };
  }

  makeCourse(courseId: string, instructorId: string): CourseDocument {
    return {
      courseId,
      title: this.faker.lorem.sentence(),
      description: this.faker.lorem.sentences(3),
      instructorId,
      category: this.faker.helpers.arrayElement(SKILLS),
      level: this.faker.helpers.arrayElement(LEVELS),
      duration: this.faker.number.int({ min: 10, max: 99 }),
      price: this.faker.number.int({ min: 1000, max: 10000 }),
      tags: this.faker.helpers.arrayElements(SKILLS, 2),
      rating: this.faker.number.float({ min: 1, max: 5, fractionDigits: 1 }),
      createdAt: this.dateBetween(subYears(this.now, 3), subYears(this.now, 2)),
      updatedAt: this.dateBetween(subYears(this.now, 1), this.now),
      isPublished: this.faker.datatype.boolean(),
    };
  }

  makeLesson(lessonId: string, courseId: string): LessonDocument {
    return {
      lessonId,
      courseId,
      title: this.faker.lorem.sentence(),
      content: this.faker.lorem.sentences(5),
      order: this.faker.number.int({ min: 0, max: 99 }),
      resources: ["intro.pdf"],
      duration: 30,
      createdAt: this.dateBetween(subYears(this.now, 3), subYears(this.now, 2)),
      updatedAt: this.dateBetween(subYears(this.now, 1), this.now),
    };
  }

  makeEnrollment(
    enrollmentId: string,
    studentId: string,
    courseId: string,
  ): EnrollmentDocument {
    const completed = this.faker.datatype.boolean();
    return {
      enrollmentId,
      studentId,
      courseId,
      enrollmentDate: this.dateBetween(subYears(this.now, 1), this.now),
      progress: completed
        ? 1
        : this.faker.number.float({ min: 0, max: 0.99, fractionDigits: 2 }),
      completed,
      certificateIssued: completed && this.faker.datatype.boolean(),
    };
  }

  /**
   * Due dates straddle `now` so both past and upcoming assignments exist
   */
  makeAssignment(assignmentId: string, courseId: string): AssignmentDocument {
    return {
      assignmentId,
      courseId,
      title: this.faker.lorem.sentence(),
      description: this.faker.lorem.sentences(2),
      dueDate: this.dateBetween(subDays(this.now, 30), addDays(this.now, 30)),
      maxScore: 100,
      createdAt: this.dateBetween(subYears(this.now, 1), subDays(this.now, 30)),
    };
  }

  makeSubmission(
    submissionId: string,
    assignmentId: string,
    studentId: string,
  ): SubmissionDocument {
    return {
      submissionId,
      assignmentId,
      studentId,
      submittedAt: this.dateBetween(subDays(this.now, 30), this.now),
      content: this.faker.lorem.paragraph(),
      grade: this.faker.number.int({ min: 40, max: 100 }),
      feedback: this.faker.lorem.sentence(),
    };
  }

  /**
   * Build a complete dataset. Every course is taught by an instructor from
   * `users`, and submissions only exist for assignments of courses the
   * student is enrolled in.
   */
  generateDataset(counts: Partial<DatasetCounts> = {}): GeneratedDataset {
    const userCount = counts.users ?? DEFAULT_DATASET_COUNTS.users;
    const courseCount = counts.courses ?? DEFAULT_DATASET_COUNTS.courses;
    const lessonsPerCourse = counts.lessonsPerCourse ?? DEFAULT_DATASET_COUNTS.lessonsPerCourse;
    const assignmentsPerCourse =
      counts.assignmentsPerCourse ?? DEFAULT_DATASET_COUNTS.assignmentsPerCourse;
    const enrollmentsPerStudent =
      counts.enrollmentsPerStudent ?? DEFAULT_DATASET_COUNTS.enrollmentsPerStudent;

    const users = Array.from({ length: userCount }, (_, i) => this.makeUser(`u${i + 1}`));
    if (users.length > 0 && !users.some((user) => user.role === "instructor")) {
      users[0].role = "instructor";
    }

    const instructors = users.filter((user) => user.role === "instructor");
    const students = users.filter((user) => user.role === "student");

    const courses: CourseDocument[] = [];
    if (instructors.length > 0) {
      for (let i = 0; i < courseCount; i++) {
        const instructor = this.faker.helpers.arrayElement(instructors);
        courses.push(this.makeCourse(`c${i + 1}`, instructor.userId));
      }
    }

    const lessons: LessonDocument[] = [];
    const assignments: AssignmentDocument[] = [];
    for (const course of courses) {
      for (let i = 0; i < lessonsPerCourse; i++) {
        lessons.push(this.makeLesson(`l${lessons.length + 1}`, course.courseId));
      }
      for (let i = 0; i < assignmentsPerCourse; i++) {
        assignments.push(this.makeAssignment(`a${assignments.length + 1}`, course.courseId));
      }
    }

    const enrollments: EnrollmentDocument[] = [];
    const submissions: SubmissionDocument[] = [];
    const perStudent = Math.min(enrollmentsPerStudent, courses.length);
    for (const student of students) {
      for (const course of this.faker.helpers.arrayElements(courses, perStudent)) {
        enrollments.push(
          this.makeEnrollment(`e${enrollments.length + 1}`, student.userId, course.courseId),
        );
        for (const assignment of assignments) {
          if (assignment.courseId !== course.courseId) continue;
          submissions.push(
            this.makeSubmission(
              `s${submissions.length + 1}`,
              assignment.assignmentId,
              student.userId,
            ),
          );
        }
      }
    }

    logger.info("Generated sample dataset", {
      users: users.length,
      courses: courses.length,
      lessons: lessons.length,
      enrollments: enrollments.length,
      assignments: assignments.length,
      submissions: submissions.length,
    });

    return { users, courses, enrollments, lessons, assignments, submissions };
  }
}

/**
 * Render a dataset as JSON; dates become ISO-8601 strings, which is the
 * format seeding converts back using the collection schemas
 */
export function serializeDataset(dataset: GeneratedDataset): string {
  return JSON.stringify(dataset, null, 2) + "\n";
}
