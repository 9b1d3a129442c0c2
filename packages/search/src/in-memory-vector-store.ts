import { disabledLogger, type Logger } from "@course-rag/core";
import type { Course, CourseCatalog } from "./catalog.js";
import type { ChunkMetadata, SearchQuery, SearchResults, VectorStore } from "./vector-store.js";

const DEFAULT_MAX_RESULTS = 5;
const MIN_TOKEN_LENGTH = 3;

export interface InMemoryVectorStoreOptions {
  catalog: CourseCatalog;
  /** Result cap when a query gives no limit */
  maxResults?: number | undefined;
  logger?: Logger | undefined;
}

interface IndexedChunk {
  text: string;
  tokens: Set<string>;
  metadata: ChunkMetadata;
}

/**
 * Keeps the catalog in memory and ranks paragraph chunks by how many query
 * terms they contain. Scores are term counts, not embedding distances.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly courses: Course[];
  private readonly chunks: IndexedChunk[] = [];
  private readonly maxResults: number;
  private readonly log: Logger;

  constructor(options: InMemoryVectorStoreOptions) {
    this.courses = options.catalog.courses;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.log = options.logger ?? disabledLogger();

    for (const course of this.courses) {
      let chunkIndex = 0;
      for (const lesson of course.lessons) {
        for (const text of splitParagraphs(lesson.content)) {
          this.chunks.push({
            text,
            tokens: new Set(tokenize(text)),
            metadata: { courseTitle: course.title, lessonNumber: lesson.lessonNumber, chunkIndex },
          });
          chunkIndex += 1;
        }
      }
    }

    this.log.debug({ courses: this.courses.length, chunks: this.chunks.length }, "course index built");
  }

  async search(query: SearchQuery): Promise<SearchResults> {
    let courseTitle: string | undefined;
    if (query.courseName !== undefined) {
      courseTitle = this.resolveCourse(query.courseName)?.title;
      if (courseTitle === undefined) {
        return { documents: [], metadata: [], error: `No course found matching '${query.courseName}'` };
      }
    }

    const terms = tokenize(query.query);
    const ranked = this.chunks
      .filter(
        (chunk) =>
          (courseTitle === undefined || chunk.metadata.courseTitle === courseTitle) &&
          (query.lessonNumber === undefined || chunk.metadata.lessonNumber === query.lessonNumber)
      )
      .map((chunk) => ({ chunk, score: terms.filter((t) => chunk.tokens.has(t)).length }))
      .filter((entry) => entry.score > 0)
      // Array.prototype.sort is stable, so ties keep catalog order
      .sort((a, b) => b.score - a.score)
      .slice(0, query.limit ?? this.maxResults);

    this.log.debug(
      { query: query.query, courseTitle, lessonNumber: query.lessonNumber, hits: ranked.length },
      "course search"
    );

    return {
      documents: ranked.map((entry) => entry.chunk.text),
      metadata: ranked.map((entry) => entry.chunk.metadata),
    };
  }

  async getCourseOutline(courseName: string): Promise<Course | undefined> {
    return this.resolveCourse(courseName);
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined> {
    return this.findCourse(courseTitle)?.lessons.find((l) => l.lessonNumber === lessonNumber)?.link;
  }

  async getCourseLink(courseTitle: string): Promise<string | undefined> {
    return this.findCourse(courseTitle)?.link;
  }

  async getCourseCount(): Promise<number> {
    return this.courses.length;
  }

  async getExistingCourseTitles(): Promise<string[]> {
    return this.courses.map((c) => c.title);
  }

  private findCourse(title: string): Course | undefined {
    return this.courses.find((c) => c.title === title);
  }

  /** Exact (case-insensitive) title, then substring either way, then best term overlap. */
  private resolveCourse(name: string): Course | undefined {
    const needle = name.trim().toLowerCase();
    if (needle === "") return undefined;

    const exact = this.courses.find((c) => c.title.toLowerCase() === needle);
    if (exact) return exact;

    const partial = this.courses.find((c) => {
      const title = c.title.toLowerCase();
      return title.includes(needle) || needle.includes(title);
    });
    if (partial) return partial;

    const terms = tokenize(name);
    let best: { course: Course; score: number } | undefined;
    for (const course of this.courses) {
      const titleTokens = new Set(tokenize(course.title));
      const score = terms.filter((t) => titleTokens.has(t)).length;
      if (score > 0 && (best === undefined || score > best.score)) {
        best = { course, score };
      }
    }
    return best?.course;
  }
}

export function tokenize(value: string): string[] {
  const tokens = value.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return [...new Set(tokens.filter((t) => t.length >= MIN_TOKEN_LENGTH))];
}

function splitParagraphs(content: string): string[] {
  return content
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}
