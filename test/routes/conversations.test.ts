import Fastify from "fastify";
import { describe, expect, it } from "vitest";
import { registerConversationRoutes } from "../../src/api/routes/conversations.js";
import { BEST_EFFORT_NOTICE } from "../../src/prompts/index.js";
import { ALIMONY_RULING, CREDIT_RULING, buildTestService } from "../../tests/helpers/court-search.js";

const LAND_RULING = "Hakim: Kamran Həsənov\n\nİl: 2021\n\nTorpaq sahəsi barədə mübahisə.";

const JUDGE_PROMPT = [
  "Hakim üzrə bir neçə uyğun dəyər tapıldı. Hansını nəzərdə tutursunuz?",
  "1. Kamran Əliyev",
  "2. Kamran Həsənov",
  "Nömrəni və ya tam adı yazın."
].join("\n");

const setup = async () => {
  const harness = buildTestService();
  await harness.service.ingest({ documentId: "doc-credit", rawText: CREDIT_RULING, sourceFilename: "credit.txt" });
  await harness.service.ingest({ documentId: "doc-alimony", rawText: ALIMONY_RULING, sourceFilename: "alimony.txt" });
  await harness.service.ingest({ documentId: "doc-land", rawText: LAND_RULING, sourceFilename: "land.txt" });
  const app = Fastify();
  await registerConversationRoutes(app, { getService: async () => harness.service });
  return app;
};

const pendingJudgeState = (rounds: number) => ({
  status: "awaiting-clarification",
  clarification_rounds: rounds,
  pending: { field: "judge", candidates: ["Kamran Əliyev", "Kamran Həsənov"] },
  queued: [],
  filters: {},
  residual_query: "",
  best_effort: false
});

describe("registerConversationRoutes", () => {
  it("asks for clarification when a judge hint is ambiguous", async () => {
    const app = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/conversations/analyze",
        payload: { conversation_id: "conv-1", utterance: "Kamranın qərarları" }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        filters: {},
        residual_query: "",
        next_state: pendingJudgeState(1),
        clarification_prompt: JUDGE_PROMPT,
        clarification_field: "judge",
        candidates: ["Kamran Əliyev", "Kamran Həsənov"],
        best_effort: false,
        notice: null
      });
    } finally {
      await app.close();
    }
  });

  it("resolves the reply and searches", async () => {
    const app = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/conversations/respond",
        payload: { utterance: "2", state: pendingJudgeState(1) }
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.filters).toEqual({ judge: "Kamran Həsənov" });
      expect(body.next_state.status).toBe("ready-to-search");
      expect(body.outcome.status).toBe("ok");
      expect(body.outcome.mode).toBe("browse");
      expect(body.outcome.hits.map((hit: { document_id: string }) => hit.document_id)).toEqual(["doc-land"]);
    } finally {
      await app.close();
    }
  });

  it("falls back to the best guess with a notice once rounds are spent", async () => {
    const app = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/conversations/respond",
        payload: { utterance: "bilmirəm", state: pendingJudgeState(2) }
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.filters).toEqual({ judge: "Kamran Əliyev" });
      expect(body.best_effort).toBe(true);
      expect(body.notice).toBe(BEST_EFFORT_NOTICE);
      expect(body.outcome.hits.map((hit: { document_id: string }) => hit.document_id)).toEqual(["doc-alimony"]);
    } finally {
      await app.close();
    }
  });

  it("does not search while clarification is pending", async () => {
    const app = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/conversations/respond",
        payload: { utterance: "Kamranın qərarları" }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().outcome).toBeNull();
      expect(response.json().clarification_field).toBe("judge");
    } finally {
      await app.close();
    }
  });

  it("rejects a state naming an unknown field", async () => {
    const app = await setup();
    try {
      const response = await app.inject({
        method: "POST",
        url: "/conversations/analyze",
        payload: {
          utterance: "1",
          state: { ...pendingJudgeState(1), pending: { field: "color", candidates: ["qırmızı"] } }
        }
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        detail: [{ type: "custom", loc: ["body", "state", "pending", "field"], msg: "Unknown metadata field: color" }]
      });
    } finally {
      await app.close();
    }
  });

  it("suggests example queries", async () => {
    const app = await setup();
    try {
      const response = await app.inject({ method: "GET", url: "/conversations/suggestions?q=aliment" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ suggestions: ["Aliment tutulması haqqında qətnamələr"] });

      const tooMany = await app.inject({ method: "GET", url: "/conversations/suggestions?limit=50" });
      expect(tooMany.statusCode).toBe(422);
    } finally {
      await app.close();
    }
  });
});
