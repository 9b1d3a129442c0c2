import { z } from "zod";
import type { Tool, ToolOutcome } from "@course-rag/core";
import type { VectorStore } from "../vector-store.js";

export const CourseOutlineArguments = z.object({
  course_name: z.string().describe("Course title (partial matches work)"),
});
export type CourseOutlineArguments = z.infer<typeof CourseOutlineArguments>;

export class CourseOutlineTool implements Tool<typeof CourseOutlineArguments> {
  readonly name = "get_course_outline";
  readonly description =
    "Get a course's title, link, instructor and complete lesson list";
  readonly arguments = CourseOutlineArguments;

  constructor(private readonly store: VectorStore) {}

  async execute(args: CourseOutlineArguments): Promise<ToolOutcome> {
    const course = await this.store.getCourseOutline(args.course_name);
    if (!course) {
      return { content: `No course found matching '${args.course_name}'`, citations: [] };
    }

    const lines = [`Course: ${course.title}`];
    if (course.link !== undefined) lines.push(`Link: ${course.link}`);
    if (course.instructor !== undefined) lines.push(`Instructor: ${course.instructor}`);
    lines.push("", `Lessons (${course.lessons.length}):`);
    for (const lesson of course.lessons) {
      lines.push(`Lesson ${lesson.lessonNumber}: ${lesson.title}`);
    }

    return {
      content: lines.join("\n"),
      citations: [
        course.link !== undefined ? { text: course.title, url: course.link } : { text: course.title },
      ],
    };
  }
}
