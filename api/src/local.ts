import express, { type ErrorRequestHandler } from "express";
import { loadConfig, type Config } from "./config";
import { listPersonas } from "./personas";
import { runGenerate } from "./service";

const rejectMalformedJson: ErrorRequestHandler = (err, _req, res, next) => {
  if (!(err instanceof SyntaxError)) return next(err);
  console.error("request body is not valid JSON:", err.message);
  return res.status(400).json({ error: "request body is not valid JSON", kind: "request" });
};

export function createApp(config: Config) {
  const app = express();
  app.use(express.json({ limit: config.bodyLimit }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.get("/api/personas", (_req, res) => res.json({ personas: listPersonas() }));

  app.post("/api/generate", (req, res) => {
    const body: unknown = req.body;
    console.log("POST /api/generate - body keys:", body && typeof body === "object" ? Object.keys(body) : typeof body);

    const result = runGenerate(body, config);
    if (result.statusCode === 200) {
      console.log(
        `Generated ${result.body.patients} patients, ${result.body.resources} resources in ${result.body.bundles.length} bundles (seed ${result.body.seed})`
      );
    } else {
      console.error(`POST /api/generate - ${result.statusCode}: ${result.body.error}`);
    }
    return res.status(result.statusCode).json(result.body);
  });

  app.use(rejectMalformedJson);

  return app;
}

if (require.main === module) {
  const config = loadConfig();
  createApp(config).listen(config.port, () => console.log(`Local API listening on http://localhost:${config.port}`));
}
