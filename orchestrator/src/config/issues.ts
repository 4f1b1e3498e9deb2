import { ZodError } from "zod";
import { ConfigIssue } from "../errors";

export function zodIssues(error: ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
