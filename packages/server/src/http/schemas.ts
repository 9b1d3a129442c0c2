import { z } from "zod";

// Unknown fields are stripped, not rejected
export const QueryRequestSchema = z.object({
  query: z.string(),
  session_id: z.string().nullish(),
});
export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export interface SourceBody {
  text: string;
  url: string | null;
}

export interface QueryResponseBody {
  answer: string;
  sources: SourceBody[];
  session_id: string;
}

export interface CourseStatsBody {
  total_courses: number;
  course_titles: string[];
}

export interface ClearSessionBody {
  message: string;
  session_id: string;
}

export interface ValidationIssue {
  loc: Array<string | number>;
  msg: string;
}

export interface ErrorBody {
  detail: string | ValidationIssue[];
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({ loc: ["body", ...issue.path], msg: issue.message }));
}
