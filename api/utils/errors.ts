import { ZodError } from "zod";
import { FormatError, UnsupportedFileTypeError } from "../../app/src/lib/import/errors";
import { HttpError } from "./http";
import { RelationNameError, RelationNotFoundError } from "./store";

export const statusForError = (error: unknown): number => {
  if (error instanceof HttpError) {
    return error.status;
  }
  if (error instanceof RelationNameError || error instanceof ZodError) {
    return 400;
  }
  if (error instanceof RelationNotFoundError) {
    return 404;
  }
  if (error instanceof UnsupportedFileTypeError) {
    return 415;
  }
  if (error instanceof FormatError) {
    return 422;
  }
  return 500;
};

export const messageForError = (error: unknown, fallback: string): string => {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  return error instanceof Error && error.message ? error.message : fallback;
};
