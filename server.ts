import "./lib/loadEnv.js";
import express, { type NextFunction, type Request, type Response } from "express";
import { handler as engagements } from "./api/engagements.js";
import { handler as payments } from "./api/payments.js";
import { handler as students } from "./api/students.js";
import { handler as tutors } from "./api/tutors.js";
import type { ApiHandler } from "./lib/apiHandler.js";
import { mountHandler } from "./lib/gateway.js";
import { createLogger, sanitizeError } from "./lib/logger.js";

const logger = createLogger().child({ service: "dev-server" });
const app = express();

app.set("trust proxy", true);
app.use(express.text({ type: "*/*", limit: "1mb" }));

const adapt = (handler: ApiHandler) => {
  const mounted = mountHandler(handler);
  return (req: Request, res: Response, next: NextFunction) => {
    mounted(req, res).catch(next);
  };
};

app.all("/tutors", adapt(tutors));
app.all("/students", adapt(students));
app.all("/engagements", adapt(engagements));
app.all("/payments", adapt(payments));

app.use((_req: Request, res: Response) => {
  res.status(404).json({ error: "not_found" });
});

app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
  logger.error({ error: sanitizeError(error) }, "dev_server_error");
  res.status(500).json({ error: "internal_error" });
});

const port = Number(process.env.PORT || 3000);
app.listen(port, () => {
  logger.info({ port }, "dev_server_listening");
});
