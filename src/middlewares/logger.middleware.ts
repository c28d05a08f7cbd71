import morgan from "morgan";
import chalk from "chalk";
import { loadConfig } from "../configs/environment";

const METHOD_COLORS: Record<string, (text: string) => string> = {
  GET: chalk.green,
  POST: chalk.yellow,
  PUT: chalk.blue,
  DELETE: chalk.red,
  PATCH: chalk.magenta,
};

const colorStatus = (status: number): string => {
  const text = String(status);
  if (status >= 500) return chalk.red(text);
  if (status >= 400) return chalk.yellow(text);
  if (status >= 300) return chalk.cyan(text);
  if (status >= 200) return chalk.green(text);
  return chalk.white(text);
};

morgan.token("timestamp", () => chalk.gray(new Date().toISOString()));

morgan.token("colored-method", (req) => {
  const method = req.method || "";
  return (METHOD_COLORS[method] || chalk.white)(method);
});

morgan.token("colored-status", (_req, res) => colorStatus(res.statusCode));

morgan.token("colored-url", (req) => chalk.cyan(req.url || ""));

morgan.token("session-id", (req) => {
  const header = req.headers["x-session-id"];
  return typeof header === "string" ? header : "-";
});

export const requestLogger = morgan(
  chalk.gray("[") +
    ":timestamp" +
    chalk.gray("]") +
    chalk.white(" INCOMING_REQUEST: ") +
    chalk.white("method=") +
    ":colored-method" +
    chalk.white(", uri=") +
    ":colored-url" +
    chalk.white(", status=") +
    ":colored-status" +
    chalk.white(", session=") +
    ":session-id" +
    chalk.white(", response-time=") +
    chalk.magenta(":response-time ms"),
  { skip: () => loadConfig().logging.level === "silent" }
);
