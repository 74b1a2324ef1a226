import { Hono } from "hono";
import { classifyError } from "../domain/errors.js";
import { AppError } from "../middleware/error-handler.js";
import type { ContentApi } from "../services/content-api.js";

async function passthrough<T>(task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof AppError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    const kind = classifyError(error);
    throw new AppError(message, kind === "authentication" ? 502 : 503);
  }
}

/** Read-only view of the content source, for picking rule targets. */
export function createContentRouter(api: ContentApi): Hono {
  const app = new Hono();

  app.get("/account", async (c) => {
    const account = await passthrough(() => api.getAccountInfo());
    return c.json({ code: 200, message: "ok", data: account }, 200);
  });

  app.get("/items", async (c) => {
    const items = await passthrough(() => api.listContentItems());
    return c.json({ code: 200, message: "ok", data: items }, 200);
  });

  app.get("/items/:id/comments", async (c) => {
    const id = c.req.param("id");
    const comments = await passthrough(() => api.listComments(id));
    return c.json({ code: 200, message: "ok", data: comments }, 200);
  });

  return app;
}
