import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { createRule, isValidRule } from "../domain/rule.js";
import { AppError } from "../middleware/error-handler.js";
import type { Rule, TargetId } from "../types/monitoring.js";

export const ruleBodySchema = z.object({
  keywords: z.array(z.string()).default([]),
  replyText: z.string().default(""),
  privateReplyText: z.string().nullish(),
  enabled: z.boolean().default(false),
});

export type RuleBody = z.infer<typeof ruleBodySchema>;

const rulesFileSchema = z.object({
  version: z.number().int().optional(),
  rules: z.record(z.string().min(1), ruleBodySchema).default({}),
});

export interface RuleStore {
  loadRules(): Promise<Map<TargetId, Rule>>;
  upsertRule(rule: Rule): Promise<void>;
  deleteRule(targetId: TargetId): Promise<boolean>;
}

function assertSavable(rule: Rule): void {
  if (rule.enabled && !isValidRule(rule)) {
    throw new AppError(`Rule for ${rule.targetId} needs a reply text before it can be enabled`, 400);
  }
}

export class InMemoryRuleStore implements RuleStore {
  protected readonly rules = new Map<TargetId, Rule>();

  constructor(initial: Rule[] = []) {
    for (const rule of initial) this.rules.set(rule.targetId, rule);
  }

  async loadRules(): Promise<Map<TargetId, Rule>> {
    return new Map(this.rules);
  }

  async upsertRule(rule: Rule): Promise<void> {
    assertSavable(rule);
    this.rules.set(rule.targetId, rule);
  }

  async deleteRule(targetId: TargetId): Promise<boolean> {
    return this.rules.delete(targetId);
  }
}

interface RulesFileShapeV1 {
  version: 1;
  updatedAt: string;
  rules: Record<TargetId, RuleBody>;
}

/**
 * Rules kept in a JSON file. The file is re-read on every `loadRules` so edits
 * made by another process show up on the next monitoring cycle.
 */
export class FileBackedRuleStore implements RuleStore {
  private readonly rulesPath: string;
  private readonly tmpPath: string;
  // read-modify-write cycles share one tmp file, so they run one at a time
  private queue: Promise<void> = Promise.resolve();

  constructor(rulesPath: string) {
    const absolute = path.isAbsolute(rulesPath) ? rulesPath : path.resolve(process.cwd(), rulesPath);
    this.rulesPath = absolute;
    this.tmpPath = `${absolute}.tmp`;
  }

  async loadRules(): Promise<Map<TargetId, Rule>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.rulesPath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return new Map();
      throw error;
    }
    const parsed = rulesFileSchema.parse(JSON.parse(raw));
    const rules = new Map<TargetId, Rule>();
    for (const [targetId, body] of Object.entries(parsed.rules)) {
      rules.set(targetId, createRule({ targetId, ...body }));
    }
    return rules;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async upsertRule(rule: Rule): Promise<void> {
    assertSavable(rule);
    await this.serialize(async () => {
      const rules = await this.loadRules();
      rules.set(rule.targetId, rule);
      await this.save(rules);
    });
  }

  deleteRule(targetId: TargetId): Promise<boolean> {
    return this.serialize(async () => {
      const rules = await this.loadRules();
      if (!rules.delete(targetId)) return false;
      await this.save(rules);
      return true;
    });
  }

  private async save(rules: Map<TargetId, Rule>): Promise<void> {
    await fs.mkdir(path.dirname(this.rulesPath), { recursive: true });
    const payload: RulesFileShapeV1 = {
      version: 1,
      updatedAt: new Date().toISOString(),
      rules: Object.fromEntries(
        Array.from(rules.values()).map((rule) => [
          rule.targetId,
          {
            keywords: [...rule.keywords],
            replyText: rule.replyText,
            privateReplyText: rule.privateReplyText,
            enabled: rule.enabled,
          },
        ]),
      ),
    };
    await fs.writeFile(this.tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await fs.rename(this.tmpPath, this.rulesPath);
  }
}
