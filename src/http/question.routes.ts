import { Router, type NextFunction, type Request, type Response } from "express";
import type { QuestionService } from "../services/question.service.js";
import {
  AddQuestionSchema,
  QuestionSchema,
  parseId,
  parseWith,
} from "../domain/schemas.js";

type Handler = (req: Request, res: Response) => Promise<void>;

/** express 4 does not catch rejected promises from handlers. */
const route =
  (handler: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

export function questionRouter(questions: QuestionService): Router {
  const router = Router();

  router.get(
    "/:id",
    route(async (req, res) => {
      const question = await questions.getQuestion(parseId(req.params.id));
      res.json(question);
    })
  );

  router.delete(
    "/:id",
    route(async (req, res) => {
      const question = await questions.getQuestion(parseId(req.params.id));
      await questions.deleteQuestion(question);
      res.send("OK");
    })
  );

  router.get(
    "/",
    route(async (_req, res) => {
      res.json(await questions.getAllQuestions());
    })
  );

  router.post(
    "/",
    route(async (req, res) => {
      const input = parseWith(AddQuestionSchema, req.body, "question");
      await questions.createQuestion(input.body, input.options);
      res.send("OK");
    })
  );

  router.put(
    "/",
    route(async (req, res) => {
      const question = parseWith(QuestionSchema, req.body, "question");
      await questions.updateQuestion(question);
      res.send("OK");
    })
  );

  return router;
}
