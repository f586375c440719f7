import express, { type Express } from "express";
import type { QuestionService } from "../services/question.service.js";
import { questionRouter } from "./question.routes.js";
import { errorHandler } from "./errors.js";

/** Request bodies above this are rejected with 413. */
export const JSON_BODY_LIMIT = "5mb";

export function createApp(questions: QuestionService): Express {
  const app = express();
  app.use(express.json({ limit: JSON_BODY_LIMIT }));
  app.use("/question", questionRouter(questions));
  app.use(errorHandler);
  return app;
}
