import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getDbPath } from "../../config/paths.js";
import type { BotConfig } from "../../config/types.js";
import { StateDB } from "../../storage/db.js";
import { PlanStore } from "../../proactive/store.js";
import type { Plan } from "../../proactive/types.js";
import { formatZoned } from "../../utils/time.js";

function withPlanStore<T>(config: BotConfig, fn: (store: PlanStore) => T): T {
  const db = new StateDB(getDbPath(config.runtime.dbPath));
  try {
    return fn(new PlanStore(db));
  } finally {
    db.close();
  }
}

function formatPlan(plan: Plan, timeZone: string): string {
  const gif = plan.gifTag ? ` gif=${plan.gifTag}` : "";
  return (
    `  #${plan.id}  ${formatZoned(plan.sendAt, timeZone)}  chat=${plan.chatId}` +
    `  confidence=${plan.confidence}${gif}\n` +
    `    text:   ${plan.text}\n` +
    `    reason: ${plan.reason || "(none)"}\n`
  );
}

export class PlansListCommand extends Command {
  static override paths = [["plans", "list"]];

  static override usage = Command.Usage({
    description: "List pending plans for a chat",
    examples: [["List pending plans", "nudgebot plans list demo-chat"]],
  });

  chatId = Option.String({ name: "chatId", required: true });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const config = loadConfig(this.config);
    const plans = withPlanStore(config, (store) => store.getPendingPlans(this.chatId));

    if (plans.length === 0) {
      this.context.stdout.write(`No pending plans for ${this.chatId}.\n`);
      return;
    }

    this.context.stdout.write(`Pending plans for ${this.chatId} (${plans.length}):\n`);
    for (const plan of plans) {
      this.context.stdout.write(formatPlan(plan, config.timezone));
    }
  }
}

export class PlansDueCommand extends Command {
  static override paths = [["plans", "due"]];

  static override usage = Command.Usage({
    description: "List plans that are due now",
    examples: [["Show due plans", "nudgebot plans due"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const config = loadConfig(this.config);
    const plans = withPlanStore(config, (store) => store.getDuePlans(Date.now()));

    if (plans.length === 0) {
      this.context.stdout.write("No plans are due.\n");
      return;
    }

    this.context.stdout.write(`Due plans (${plans.length}):\n`);
    for (const plan of plans) {
      this.context.stdout.write(formatPlan(plan, config.timezone));
    }
  }
}

export class PlansCancelCommand extends Command {
  static override paths = [["plans", "cancel"]];

  static override usage = Command.Usage({
    description: "Cancel every pending plan for a chat",
    examples: [["Cancel pending plans", "nudgebot plans cancel demo-chat"]],
  });

  chatId = Option.String({ name: "chatId", required: true });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const config = loadConfig(this.config);
    const count = withPlanStore(config, (store) => store.cancelAllPlans(this.chatId, Date.now()));
    this.context.stdout.write(`Canceled ${count} pending plan(s) for ${this.chatId}\n`);
  }
}
