import type { CourseAnalyticsProvider } from "@course-rag/core";
import type { Course } from "./catalog.js";

export interface ChunkMetadata {
  courseTitle: string;
  lessonNumber?: number | undefined;
  chunkIndex: number;
}

/** Parallel arrays: `metadata[i]` describes `documents[i]`. */
export interface SearchResults {
  documents: string[];
  metadata: ChunkMetadata[];
  error?: string | undefined;
}

export interface SearchQuery {
  query: string;
  /** Partial names are resolved to the closest course title */
  courseName?: string | undefined;
  lessonNumber?: number | undefined;
  limit?: number | undefined;
}

/**
 * Port to the course content store. Failures that the model should hear
 * about (an unknown course) come back in `SearchResults.error`.
 */
export interface VectorStore extends CourseAnalyticsProvider {
  search(query: SearchQuery): Promise<SearchResults>;
  getCourseOutline(courseName: string): Promise<Course | undefined>;
  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | undefined>;
  getCourseLink(courseTitle: string): Promise<string | undefined>;
}
