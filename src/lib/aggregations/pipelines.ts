/**
 * Aggregation pipeline builders
 *
 * Pure functions so the stage layout can be inspected and tested without a
 * server. Each builder names the collection it is meant to run against.
 */

import type { Document } from "mongodb";

function lookupUser(localField: string, as: string): Document {
  return {
    $lookup: {
      from: "users",
      localField,
      foreignField: "userId",
      as,
    },
  };
}

function lookupCourse(as: string): Document {
  return {
    $lookup: {
      from: "courses",
      localField: "courseId",
      foreignField: "courseId",
      as,
    },
  };
}

function fullName(alias: string): Document {
  return { $concat: [`$${alias}.firstName`, " ", `$${alias}.lastName`] };
}

/** courses: attach the instructor's user document */
export function courseDetailsPipeline(): Document[] {
  return [lookupUser("instructorId", "instructor"), { $unwind: "$instructor" }];
}

/** enrollments: enrollment count per course, with the course title */
export function enrollmentMetricsPipeline(): Document[] {
  return [
    { $group: { _id: "$courseId", totalEnrollments: { $sum: 1 } } },
    {
      $lookup: {
        from: "courses",
        localField: "_id",
        foreignField: "courseId",
        as: "course",
      },
    },
    { $unwind: "$course" },
    {
      $project: {
        _id: 0,
        courseId: "$_id",
        courseTitle: "$course.title",
        totalEnrollments: 1,
      },
    },
  ];
}

/** courses: one row with the overall average rating */
export function averageCourseRatingPipeline(): Document[] {
  return [
    {
      $group: {
        _id: null,
        averageRating: { $avg: "$rating" },
        count: { $sum: 1 },
      },
    },
    { $project: { _id: 0, averageRating: 1, count: 1 } },
  ];
}

/** courses: titles, average rating and count per category */
export function coursesByCategoryPipeline(): Document[] {
  return [
    {
      $group: {
        _id: "$category",
        courses: { $push: "$title" },
        averageRating: { $avg: "$rating" },
        totalCourses: { $sum: 1 },
      },
    },
    {
      $project: {
        _id: 0,
        category: "$_id",
        courses: 1,
        averageRating: 1,
        totalCourses: 1,
      },
    },
  ];
}

/**
 * submissions: average grade per student.
 * With `limit`, only the best `limit` students by average grade are kept.
 */
export function averageGradePerStudentPipeline(limit?: number): Document[] {
  const ranking: Document[] =
    limit === undefined ? [] : [{ $sort: { averageGrade: -1 } }, { $limit: limit }];

  return [
    {
      $group: {
        _id: "$studentId",
        averageGrade: { $avg: "$grade" },
        submissions: { $sum: 1 },
      },
    },
    ...ranking,
    lookupUser("_id", "student"),
    { $unwind: "$student" },
    {
      $project: {
        _id: 0,
        studentId: "$_id",
        studentName: fullName("student"),
        averageGrade: 1,
        submissions: 1,
      },
    },
  ];
}

/** enrollments: share of completed enrollments per course */
export function courseCompletionRatePipeline(): Document[] {
  return [
    {
      $group: {
        _id: "$courseId",
        total: { $sum: 1 },
        completed: { $sum: { $cond: ["$completed", 1, 0] } },
      },
    },
    {
      $project: {
        _id: 0,
        courseId: "$_id",
        completionRate: {
          $cond: [{ $eq: ["$total", 0] }, 0, { $divide: ["$completed", "$total"] }],
        },
        totalEnrolled: "$total",
      },
    },
  ];
}

/** enrollments: distinct students and courses per instructor */
export function studentsPerInstructorPipeline(): Document[] {
  return [
    lookupCourse("course"),
    { $unwind: "$course" },
    {
      $group: {
        _id: "$course.instructorId",
        students: { $addToSet: "$studentId" },
        coursesTaught: { $addToSet: "$course.courseId" },
      },
    },
    {
      $project: {
        _id: 0,
        instructorId: "$_id",
        totalStudents: { $size: "$students" },
        coursesTaught: 1,
      },
    },
  ];
}

/** courses: average rating per instructor */
export function averageRatingPerInstructorPipeline(): Document[] {
  return [
    {
      $group: {
        _id: "$instructorId",
        averageRating: { $avg: "$rating" },
        courses: { $push: "$title" },
      },
    },
    lookupUser("_id", "instructor"),
    { $unwind: "$instructor" },
    {
      $project: {
        _id: 0,
        instructorId: "$_id",
        instructorName: fullName("instructor"),
        averageRating: 1,
        courses: 1,
      },
    },
  ];
}

/** enrollments: course price summed over every enrollment, per instructor */
export function revenuePerInstructorPipeline(): Document[] {
  return [
    lookupCourse("course"),
    { $unwind: "$course" },
    {
      $group: {
        _id: "$course.instructorId",
        revenue: { $sum: "$course.price" },
        courses: { $addToSet: "$course.courseId" },
      },
    },
    lookupUser("_id", "instructor"),
    { $unwind: "$instructor" },
    {
      $project: {
        _id: 0,
        instructorId: "$_id",
        instructorName: fullName("instructor"),
        revenue: 1,
        courses: 1,
      },
    },
  ];
}

/** enrollments: enrollment count per calendar month, oldest first */
export function monthlyEnrollmentTrendPipeline(): Document[] {
  return [
    {
      $group: {
        _id: {
          year: { $year: "$enrollmentDate" },
          month: { $month: "$enrollmentDate" },
        },
        totalEnrollments: { $sum: 1 },
      },
    },
    { $sort: { "_id.year": 1, "_id.month": 1 } },
    {
      $project: {
        _id: 0,
        year: "$_id.year",
        month: "$_id.month",
        totalEnrollments: 1,
      },
    },
  ];
}

/** courses: categories with the most courses */
export function popularCategoriesPipeline(limit: number): Document[] {
  return [
    { $group: { _id: "$category", totalCourses: { $sum: 1 } } },
    { $sort: { totalCourses: -1 } },
    { $limit: limit },
    { $project: { _id: 0, category: "$_id", totalCourses: 1 } },
  ];
}

/** submissions: submission count and average grade per student */
export function studentEngagementPipeline(): Document[] {
  return [
    {
      $group: {
        _id: "$studentId",
        totalSubmissions: { $sum: 1 },
        averageGrade: { $avg: "$grade" },
      },
    },
    lookupUser("_id", "student"),
    { $unwind: "$student" },
    {
      $project: {
        _id: 0,
        studentId: "$_id",
        studentName: fullName("student"),
        totalSubmissions: 1,
        averageGrade: 1,
      },
    },
  ];
}
