import { readFile } from "node:fs/promises";
import { z } from "zod";

export const LessonSchema = z.object({
  lessonNumber: z.number().int().nonnegative(),
  title: z.string().min(1),
  link: z.string().url().optional(),
  content: z.string(),
});
export type Lesson = z.infer<typeof LessonSchema>;

export const CourseSchema = z.object({
  // titles double as course ids
  title: z.string().min(1),
  instructor: z.string().optional(),
  link: z.string().url().optional(),
  lessons: z.array(LessonSchema),
});
export type Course = z.infer<typeof CourseSchema>;

export const CourseCatalogSchema = z
  .object({ courses: z.array(CourseSchema) })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.courses.forEach((course, index) => {
      if (seen.has(course.title)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["courses", index, "title"],
          message: `Duplicate course title '${course.title}'`,
        });
      }
      seen.add(course.title);
    });
  });
export type CourseCatalog = z.infer<typeof CourseCatalogSchema>;

/**
 * Reads a course catalog JSON file and validates it.
 * Throws on unreadable files, malformed JSON, or schema violations.
 */
export async function loadCourseCatalog(path: string): Promise<CourseCatalog> {
  const content = await readFile(path, "utf-8");

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(
      `Failed to parse course catalog ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = CourseCatalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid course catalog ${path}: ${issues}`);
  }

  return result.data;
}
