import { serve } from "@hono/node-server";
import { loadEnv } from "./config/env.ts";
import { createAppContext } from "./context.ts";
import { createApp } from "./app.ts";

const env = loadEnv();
const ctx = createAppContext(env);
const app = createApp(ctx);

serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    console.log(`PSX Portfolio API listening on port ${info.port} (reasoning: ${env.LLM_PROVIDER})`);
  },
);
