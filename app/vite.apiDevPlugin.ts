import type { Connect, PluginOption } from "vite";
import ingestHandler from "../api/ingest";
import relationHandler from "../api/relation";
import relationsHandler from "../api/relations";
import type { ApiHandler } from "../api/utils/http";

const routes: Record<string, ApiHandler> = {
  "/api/ingest": ingestHandler,
  "/api/relations": relationsHandler,
  "/api/relation": relationHandler
};

const apiMiddleware: Connect.NextHandleFunction = (req, res, next) => {
  const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
  const handler = routes[pathname];
  if (!handler) {
    next();
    return;
  }
  handler(req, res).catch((error: unknown) => {
    // surface the error in dev for visibility
    console.error(`[${pathname}] dev handler error`, error);
    res.statusCode = 500;
    res.setHeader("Content-Type", "application/json");
    res.end(
      JSON.stringify({
        error: "Dev handler error",
        requestId: "dev"
      })
    );
  });
};

/** Serves the Node handlers under /api for `vite` and `vite preview`. */
export const apiDevPlugin = (): PluginOption => ({
  name: "explorer-api-endpoints",
  configureServer(server) {
    server.middlewares.use(apiMiddleware);
  },
  configurePreviewServer(server) {
    server.middlewares.use(apiMiddleware);
  }
});
