import { z } from "zod";
import type { Citation, Tool, ToolOutcome } from "@course-rag/core";
import type { ChunkMetadata, VectorStore } from "../vector-store.js";

export const CourseSearchArguments = z.object({
  query: z.string().describe("What to search for in the course content"),
  course_name: z
    .string()
    .optional()
    .describe("Course title (partial matches work, e.g. 'MCP', 'Introduction')"),
  lesson_number: z
    .number()
    .int()
    .optional()
    .describe("Specific lesson number to search within (e.g. 1, 2, 3)"),
});
export type CourseSearchArguments = z.infer<typeof CourseSearchArguments>;

/**
 * search_course_content: ranked excerpts from course materials, each headed
 * with its course and lesson, cited with the lesson link when one exists.
 */
export class CourseSearchTool implements Tool<typeof CourseSearchArguments> {
  readonly name = "search_course_content";
  readonly description =
    "Search course materials with smart course name matching and lesson filtering";
  readonly arguments = CourseSearchArguments;

  constructor(private readonly store: VectorStore) {}

  async execute(args: CourseSearchArguments): Promise<ToolOutcome> {
    const results = await this.store.search({
      query: args.query,
      courseName: args.course_name,
      lessonNumber: args.lesson_number,
    });

    if (results.error !== undefined) {
      return { content: results.error, citations: [] };
    }

    if (results.documents.length === 0) {
      let message = "No relevant content found";
      if (args.course_name !== undefined) message += ` in course '${args.course_name}'`;
      if (args.lesson_number !== undefined) message += ` in lesson ${args.lesson_number}`;
      return { content: `${message}.`, citations: [] };
    }

    const blocks: string[] = [];
    const citations: Citation[] = [];
    const cited = new Set<string>();

    for (const [i, document] of results.documents.entries()) {
      const meta = results.metadata[i];
      if (!meta) continue;

      const label = sourceLabel(meta);
      blocks.push(`[${label}]\n${document}`);

      if (cited.has(label)) continue;
      cited.add(label);
      const url = await this.linkFor(meta);
      citations.push(url !== undefined ? { text: label, url } : { text: label });
    }

    return { content: blocks.join("\n\n"), citations };
  }

  private async linkFor(meta: ChunkMetadata): Promise<string | undefined> {
    if (meta.lessonNumber !== undefined) {
      return this.store.getLessonLink(meta.courseTitle, meta.lessonNumber);
    }
    return this.store.getCourseLink(meta.courseTitle);
  }
}

function sourceLabel(meta: ChunkMetadata): string {
  return meta.lessonNumber !== undefined
    ? `${meta.courseTitle} - Lesson ${meta.lessonNumber}`
    : meta.courseTitle;
}
