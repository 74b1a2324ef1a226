import { Hono } from "hono";
import { createRule, isValidRule, keywordsSummary } from "../domain/rule.js";
import { AppError } from "../middleware/error-handler.js";
import { ruleBodySchema, type RuleStore } from "../services/rule-store.js";
import type { Rule } from "../types/monitoring.js";

function toView(rule: Rule) {
  return {
    targetId: rule.targetId,
    keywords: [...rule.keywords],
    replyText: rule.replyText,
    privateReplyText: rule.privateReplyText ?? null,
    enabled: rule.enabled,
    valid: isValidRule(rule),
    summary: keywordsSummary(rule),
  };
}

export function createRulesRouter(store: RuleStore): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    const rules = await store.loadRules();
    return c.json({ code: 200, message: "ok", data: Array.from(rules.values()).map(toView) }, 200);
  });

  app.get("/:targetId", async (c) => {
    const targetId = c.req.param("targetId");
    const rule = (await store.loadRules()).get(targetId);
    if (!rule) throw new AppError("Rule Not Found", 404);
    return c.json({ code: 200, message: "ok", data: toView(rule) }, 200);
  });

  app.put("/:targetId", async (c) => {
    const targetId = c.req.param("targetId");
    const body = ruleBodySchema.parse(await c.req.json().catch(() => ({})));
    const rule = createRule({ targetId, ...body });
    await store.upsertRule(rule);
    return c.json({ code: 200, message: "ok", data: toView(rule) }, 200);
  });

  app.delete("/:targetId", async (c) => {
    const removed = await store.deleteRule(c.req.param("targetId"));
    if (!removed) throw new AppError("Rule Not Found", 404);
    return c.json({ code: 200, message: "ok" }, 200);
  });

  return app;
}
