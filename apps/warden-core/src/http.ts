import { createServer, type Server } from "node:http";

import type { GuildSettingsStore } from "@guildwarden/ports";
import { logError, logInfo } from "@warden-core/src/logging";

type Deps = {
  port: number;
  store: Pick<GuildSettingsStore, "ping">;
};

export type HttpResponse = {
  status: number;
  body: Record<string, unknown>;
};

const json = (body: Record<string, unknown>, status = 200): HttpResponse => ({
  status,
  body,
});

const runReadinessChecks = async (
  store: Pick<GuildSettingsStore, "ping">,
): Promise<{ ok: true } | { ok: false; reasons: string[] }> => {
  const reasons: string[] = [];

  try {
    await store.ping();
  } catch {
    reasons.push("db_unreachable");
  }

  if (reasons.length > 0) {
    return { ok: false, reasons };
  }

  return { ok: true };
};

export const routeRequest = async (
  method: string,
  url: string,
  store: Pick<GuildSettingsStore, "ping">,
): Promise<HttpResponse> => {
  const { pathname } = new URL(url, "http://localhost");

  if (method === "GET" && pathname === "/health") {
    return json({ ok: true, status: "alive" });
  }

  if (method === "GET" && pathname === "/ready") {
    const checks = await runReadinessChecks(store);
    if (checks.ok) {
      return json({ ok: true, status: "ready" });
    }
    return json(
      {
        ok: false,
        status: "not_ready",
        reasons: checks.reasons,
      },
      503,
    );
  }

  return json({ ok: false, error: "not_found" }, 404);
};

export const startHttpServer = ({ port, store }: Deps): Server => {
  const server = createServer((request, response) => {
    routeRequest(request.method ?? "GET", request.url ?? "/", store)
      .then(({ status, body }) => {
        response.writeHead(status, { "content-type": "application/json" });
        response.end(JSON.stringify(body));
      })
      .catch((error: unknown) => {
        logError("http.request_failed", {
          url: request.url ?? null,
          error: String(error),
        });
        response.writeHead(500, { "content-type": "application/json" });
        response.end(JSON.stringify({ ok: false, error: "internal_error" }));
      });
  });

  server.listen(port, () => {
    logInfo("http.listening", { port });
  });
  return server;
};
