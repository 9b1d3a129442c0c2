export {
  LessonSchema,
  CourseSchema,
  CourseCatalogSchema,
  loadCourseCatalog,
} from "./catalog.js";
export type { Lesson, Course, CourseCatalog } from "./catalog.js";

export type { VectorStore, SearchQuery, SearchResults, ChunkMetadata } from "./vector-store.js";

export { InMemoryVectorStore, tokenize } from "./in-memory-vector-store.js";
export type { InMemoryVectorStoreOptions } from "./in-memory-vector-store.js";

export { CourseSearchTool, CourseSearchArguments } from "./tools/course-search-tool.js";
export { CourseOutlineTool, CourseOutlineArguments } from "./tools/course-outline-tool.js";
