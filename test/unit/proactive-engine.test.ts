import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ProactiveEngine } from "../../src/proactive/engine.js";
import { PlanStore } from "../../src/proactive/store.js";
import { ConversationStore } from "../../src/conversation/store.js";
import { GifLibrary } from "../../src/media/gif-library.js";
import type { BotConfig } from "../../src/config/types.js";
import type { PlanDraft } from "../../src/proactive/types.js";
import { RecordingConnector } from "../helpers/mock-connector.js";
import { makeConfig, makeDraft, makeTempState, silentLogger, type TempState } from "../helpers/fixtures.js";

const NOON = Date.UTC(2026, 0, 15, 12);

const BASE_CONFIG = {
  proactive: { enabled: true, maxPerDay: 1, cooldownHours: 6 },
  quietHours: [{ start: "22:00", end: "07:00" }],
};

describe("ProactiveEngine", () => {
  let state: TempState;
  let plans: PlanStore;
  let conversations: ConversationStore;
  let connector: RecordingConnector;
  let gifs: GifLibrary;
  let now: number;

  function createEngine(config: BotConfig = makeConfig(BASE_CONFIG)): ProactiveEngine {
    return new ProactiveEngine({
      plans,
      conversations,
      connector,
      gifs,
      logger: silentLogger(),
      config,
      random: () => 0,
      now: () => now,
    });
  }

  function addDuePlan(chatId = "chat-1", overrides: Partial<PlanDraft> = {}): number {
    return plans.addPlan(chatId, makeDraft({ sendAt: now - 1000, text: "Any news?", ...overrides }), now - 5000);
  }

  beforeEach(() => {
    state = makeTempState("nudgebot-engine-");
    plans = new PlanStore(state.db);
    conversations = new ConversationStore(state.db);
    connector = new RecordingConnector();
    gifs = new GifLibrary(join(state.dir, "no-gifs"));
    now = NOON;
    conversations.ensureConversation("chat-1", "direct");
  });

  afterEach(() => {
    vi.useRealTimers();
    state.cleanup();
  });

  describe("tick", () => {
    it("returns an empty report when nothing is due", async () => {
      plans.addPlan("chat-1", makeDraft({ sendAt: now + 60_000 }), now);
      const report = await createEngine().tick();
      expect(report).toEqual({ due: 0, sent: 0, canceled: 0, rescheduled: 0, failed: 0 });
      expect(connector.sent).toEqual([]);
    });

    it("sends a due plan and records it", async () => {
      const id = addDuePlan();
      const report = await createEngine().tick();

      expect(report).toEqual({ due: 1, sent: 1, canceled: 0, rescheduled: 0, failed: 0 });
      expect(connector.sent).toEqual([{ kind: "text", chatId: "chat-1", body: "Any news?" }]);
      expect(plans.getPlan(id)?.status).toBe("sent");

      const conv = conversations.getConversation("chat-1");
      expect(conv.lastBotAt).toBe(NOON);
      expect(conv.dailyCount).toBe(1);
      expect(conv.dailyDate).toBe("2026-01-15");

      const [last] = conversations.getRecentMessages("chat-1", 1);
      expect(last).toEqual({
        chatId: "chat-1",
        senderId: "bot",
        role: "bot",
        ts: NOON,
        content: "Any news?",
        msgType: "text",
      });
    });

    it("cancels without dispatch once the daily cap is reached", async () => {
      conversations.updateDailyCounter("chat-1", 1, "2026-01-15");
      const id = addDuePlan();

      const report = await createEngine().tick();

      expect(report.canceled).toBe(1);
      expect(connector.sent).toEqual([]);
      expect(plans.getPlan(id)?.status).toBe("canceled");
    });

    it("rolls the counter over on a new local date", async () => {
      conversations.updateDailyCounter("chat-1", 1, "2026-01-14");
      addDuePlan();

      const report = await createEngine().tick();

      expect(report.sent).toBe(1);
      const conv = conversations.getConversation("chat-1");
      expect(conv.dailyCount).toBe(1);
      expect(conv.dailyDate).toBe("2026-01-15");
    });

    it("cancels when proactive messaging was disabled after planning", async () => {
      const id = addDuePlan();
      const report = await createEngine(makeConfig({ ...BASE_CONFIG, proactive: { enabled: false } })).tick();
      expect(report.canceled).toBe(1);
      expect(plans.getPlan(id)?.status).toBe("canceled");
    });

    it("cancels group plans when groups do not allow proactive messages", async () => {
      conversations.ensureConversation("team", "group");
      const id = addDuePlan("team");
      const report = await createEngine().tick();
      expect(report.canceled).toBe(1);
      expect(plans.getPlan(id)?.status).toBe("canceled");
    });

    it("reschedules to the end of quiet hours", async () => {
      now = Date.UTC(2026, 0, 15, 23);
      const id = addDuePlan();

      const report = await createEngine().tick();

      expect(report.rescheduled).toBe(1);
      expect(connector.sent).toEqual([]);
      const plan = plans.getPlan(id);
      expect(plan?.status).toBe("pending");
      expect(plan?.sendAt).toBe(Date.UTC(2026, 0, 16, 7));
    });

    it("reschedules to the cooldown boundary", async () => {
      conversations.updateLastBotAt("chat-1", NOON - 2 * 3_600_000);
      const id = addDuePlan();

      const report = await createEngine().tick();

      expect(report.rescheduled).toBe(1);
      expect(plans.getPlan(id)?.sendAt).toBe(NOON + 4 * 3_600_000);
    });

    it("leaves the plan pending when the text send fails", async () => {
      connector.failText = true;
      const id = addDuePlan();

      const report = await createEngine().tick();

      expect(report).toEqual({ due: 1, sent: 0, canceled: 0, rescheduled: 0, failed: 1 });
      expect(plans.getPlan(id)?.status).toBe("pending");
      const conv = conversations.getConversation("chat-1");
      expect(conv.dailyCount).toBe(0);
      expect(conv.lastBotAt).toBeNull();
      expect(conversations.getRecentMessages("chat-1", 10)).toEqual([]);
    });

    it("keeps processing other plans after one fails", async () => {
      const orphan = plans.addPlan("ghost", makeDraft({ sendAt: now - 2000 }), now);
      const id = addDuePlan();

      const report = await createEngine().tick();

      expect(report.failed).toBe(1);
      expect(report.sent).toBe(1);
      expect(plans.getPlan(orphan)?.status).toBe("pending");
      expect(plans.getPlan(id)?.status).toBe("sent");
    });

    it("does not resend a plan that is already sent", async () => {
      const id = addDuePlan();
      const engine = createEngine();
      await engine.tick();
      now += 7 * 3_600_000;

      const report = await engine.tick();

      expect(report.due).toBe(0);
      expect(connector.sent).toHaveLength(1);
      expect(plans.getPlan(id)?.status).toBe("sent");
    });

    it("skips a tick while the previous one is still running", async () => {
      let release: () => void = () => {};
      const sendText = vi.spyOn(connector, "sendText").mockImplementation(
        () => new Promise<void>((resolve) => { release = resolve; }),
      );
      addDuePlan();
      const engine = createEngine();

      const first = engine.tick();
      const second = await engine.tick();
      release();
      const report = await first;

      expect(second.due).toBe(0);
      expect(report.sent).toBe(1);
      expect(sendText).toHaveBeenCalledTimes(1);
    });
  });

  describe("gifs", () => {
    beforeEach(() => {
      const folder = join(state.dir, "gifs");
      mkdirSync(folder);
      writeFileSync(join(folder, "wave_hello.gif"), "");
      gifs = new GifLibrary(folder);
    });

    it("sends a matching gif after the text", async () => {
      addDuePlan("chat-1", { gifTag: "wave" });
      await createEngine().tick();

      expect(connector.sent).toEqual([
        { kind: "text", chatId: "chat-1", body: "Any news?" },
        { kind: "gif", chatId: "chat-1", body: join(state.dir, "gifs", "wave_hello.gif") },
      ]);
      const recent = conversations.getRecentMessages("chat-1", 10);
      expect(recent.map((m) => m.msgType)).toEqual(["text", "gif"]);
    });

    it("skips the gif when the rate is off", async () => {
      addDuePlan("chat-1", { gifTag: "wave" });
      await createEngine(makeConfig({ ...BASE_CONFIG, gifRate: "off" })).tick();
      expect(connector.sent.map((s) => s.kind)).toEqual(["text"]);
    });

    it("still marks the plan sent when only the gif fails", async () => {
      connector.failGif = true;
      const id = addDuePlan("chat-1", { gifTag: "wave" });

      const report = await createEngine().tick();

      expect(report.sent).toBe(1);
      expect(plans.getPlan(id)?.status).toBe("sent");
      expect(conversations.getConversation("chat-1").dailyCount).toBe(1);
    });
  });

  describe("start / stop", () => {
    it("ticks on the configured interval", () => {
      vi.useFakeTimers();
      const engine = createEngine(makeConfig({ ...BASE_CONFIG, runtime: { schedulerIntervalSeconds: 5 } }));
      const tick = vi
        .spyOn(engine, "tick")
        .mockResolvedValue({ due: 0, sent: 0, canceled: 0, rescheduled: 0, failed: 0 });

      engine.start();
      vi.advanceTimersByTime(5_000);
      expect(tick).toHaveBeenCalledTimes(1);
      vi.advanceTimersByTime(10_000);
      expect(tick).toHaveBeenCalledTimes(3);

      engine.stop();
      vi.advanceTimersByTime(10_000);
      expect(tick).toHaveBeenCalledTimes(3);
    });
  });
});
