import type { APIGatewayProxyHandlerV2 } from "aws-lambda";
import { loadConfig } from "./config";
import { runGenerate } from "./service";

const config = loadConfig();

export const handler: APIGatewayProxyHandlerV2 = async (event) => {
  let body: unknown;
  try {
    body = event.body ? JSON.parse(event.body) : {};
  } catch {
    return {
      statusCode: 400,
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ error: "request body is not valid JSON", kind: "request" }),
    };
  }

  const result = runGenerate(body, config);
  if (result.statusCode !== 200) console.error(`generate failed (${result.statusCode}):`, result.body.error);
  else console.log(`generated ${result.body.patients} patients in ${result.body.bundles.length} bundles (seed ${result.body.seed})`);

  return {
    statusCode: result.statusCode,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(result.body),
  };
};
