import { describe, it, expect, beforeEach } from "vitest";
import type { Claim, VerificationResult } from "@shared/generationSchema";
import {
  FactCheckPipeline,
  aggregateVerifications,
  createClaimsCardVerifier,
  parseClaims,
  verdictFor,
} from "../pipeline/factChecker";
import { FakeGateway, testContext } from "./helpers";

function result(claimIndex: number, confidence: number): VerificationResult {
  return {
    claimIndex,
    claim: `claim ${claimIndex}`,
    confidence,
    sources: [],
    reasoning: "",
    verified: confidence >= 0.7,
  };
}

function claim(importance: Claim["importance"]): Claim {
  return { claim: "c", type: "scientific", importance };
}

describe("verdictFor", () => {
  it("should map confidence bands to verdicts", () => {
    expect(verdictFor(0.85)).toBe("verified");
    expect(verdictFor(0.8)).toBe("verified");
    expect(verdictFor(0.6)).toBe("likely_accurate");
    expect(verdictFor(0.4)).toBe("uncertain");
    expect(verdictFor(0.25)).toBe("likely_inaccurate");
    expect(verdictFor(0.19)).toBe("false");
  });
});

describe("aggregateVerifications", () => {
  it("should report 0.5 and unverifiable without results", () => {
    expect(aggregateVerifications([], [])).toEqual({
      confidence: 0.5,
      verdict: "unverifiable",
      summary: "No claims could be extracted for verification.",
    });
  });

  it("should weight confidences by claim importance", () => {
    const aggregate = aggregateVerifications([claim("high"), claim("low")], [result(0, 0.9), result(1, 0.3)]);

    expect(aggregate.confidence).toBeCloseTo(0.75, 10);
    expect(aggregate.verdict).toBe("likely_accurate");
    expect(aggregate.summary).toBe("1/2 claims verified. The content is mostly accurate with minor uncertainties.");
  });

  it("should stay within the lowest and highest confidence", () => {
    const cases: Array<[Claim[], VerificationResult[]]> = [
      [[claim("medium"), claim("medium")], [result(0, 0.7), result(1, 0.7)]],
      [[claim("high"), claim("medium"), claim("low")], [result(0, 0.1), result(1, 0.2), result(2, 0.95)]],
      [[], [result(0, 0.33), result(1, 0.66)]],
    ];

    for (const [claims, results] of cases) {
      const confidences = results.map((r) => r.confidence);
      const { confidence } = aggregateVerifications(claims, results);
      expect(confidence).toBeGreaterThanOrEqual(Math.min(...confidences));
      expect(confidence).toBeLessThanOrEqual(Math.max(...confidences));
    }
  });

  it("should map a single claim straight to its verdict", () => {
    expect(aggregateVerifications([claim("medium")], [result(0, 0.85)]).verdict).toBe("verified");
    expect(aggregateVerifications([claim("medium")], [result(0, 0.25)]).verdict).toBe("likely_inaccurate");
  });
});

describe("parseClaims", () => {
  it("should default unknown types and importances", () => {
    const content = JSON.stringify([
      { claim: "Water boils at 100 C at sea level", type: "scientific", importance: "high" },
      { claim: "Paris is in France", importance: "critical" },
      { type: "statistic" },
    ]);

    expect(parseClaims(content)).toEqual([
      { claim: "Water boils at 100 C at sea level", type: "scientific", importance: "high" },
      { claim: "Paris is in France", type: "unknown", importance: "medium" },
    ]);
  });
});

describe("FactCheckPipeline", () => {
  let gateway: FakeGateway;
  let pipeline: FactCheckPipeline;

  beforeEach(() => {
    gateway = new FakeGateway();
    pipeline = new FactCheckPipeline({ gateway, model: "checker-model" });
  });

  it("should extract, verify and aggregate claims", async () => {
    gateway.respondWith(
      JSON.stringify([
        { claim: "Mitochondria produce ATP", type: "scientific", importance: "high" },
        { claim: "Cells have walls", type: "scientific", importance: "low" },
      ])
    );
    gateway.confidenceFor = (text) => (text === "Mitochondria produce ATP" ? 0.9 : 0.3);

    const report = await pipeline.check("Mitochondria produce ATP. All cells have walls.", {
      context: "Cell biology notes",
    });

    expect(gateway.generateCalls[0]).toMatchObject({ model: "checker-model", temperature: 0.3, maxTokens: 1000 });
    expect(gateway.verifyCalls).toEqual([
      { claim: "Mitochondria produce ATP", context: "Cell biology notes" },
      { claim: "Cells have walls", context: "Cell biology notes" },
    ]);
    expect(report.verificationResults.map((r) => r.verified)).toEqual([true, false]);
    expect(report.confidence).toBeCloseTo(0.75, 10);
    expect(report.verdict).toBe("likely_accurate");
    expect(report.cancelled).toBe(false);
  });

  it("should check a single claim without extraction", async () => {
    gateway.confidenceFor = () => 0.85;

    const report = await pipeline.check("The Moon orbits the Earth", { sourceType: "claim" });

    expect(gateway.generateCalls).toHaveLength(0);
    expect(report.claims).toEqual([{ claim: "The Moon orbits the Earth", type: "unknown", importance: "medium" }]);
    expect(report.verdict).toBe("verified");
    expect(report.summary).toBe("1/1 claims verified. The content appears to be factually accurate.");
  });

  it("should report unverifiable for empty content", async () => {
    const report = await pipeline.check("   ");

    expect(gateway.generateCalls).toHaveLength(0);
    expect(gateway.verifyCalls).toHaveLength(0);
    expect(report).toMatchObject({ confidence: 0.5, verdict: "unverifiable", claims: [] });
  });

  it("should fall back to the whole content when extraction fails", async () => {
    gateway.respondWith(new Error("gateway down"));

    const report = await pipeline.check("Light travels fast");

    expect(report.claims).toEqual([{ claim: "Light travels fast", type: "unknown", importance: "medium" }]);
    expect(gateway.verifyCalls).toEqual([{ claim: "Light travels fast", context: null }]);
  });

  it("should fall back to the whole content when no claims parse", async () => {
    gateway.respondWith("not json");

    const report = await pipeline.check("Light travels fast");

    expect(report.claims).toHaveLength(1);
    expect(report.claims[0].claim).toBe("Light travels fast");
  });

  it("should score a failed verification 0.5 and unverified", async () => {
    gateway.verifyError = new Error("rate limited");

    const report = await pipeline.check("Sound is a wave", { sourceType: "claim" });

    expect(report.verificationResults[0]).toEqual({
      claimIndex: 0,
      claim: "Sound is a wave",
      confidence: 0.5,
      sources: [],
      reasoning: "Verification failed: rate limited",
      verified: false,
    });
    expect(report.verdict).toBe("uncertain");
  });

  it("should report a cancelled run", async () => {
    const report = await pipeline.check("Anything", {
      pipelineContext: testContext({ signal: { isCancelled: () => true } }),
    });

    expect(report.cancelled).toBe(true);
    expect(report.verdict).toBe("unverifiable");
  });

  it("should verify a card through the claims pipeline", async () => {
    gateway.respondWith(JSON.stringify([{ claim: "Paris is the capital of France", type: "geography", importance: "high" }]));
    gateway.verifySources = ["Atlas", "Atlas"];
    const verifier = createClaimsCardVerifier(pipeline);

    const verification = await verifier.verify(
      { front: "Capital of France?", back: "Paris", tags: [] },
      null,
      testContext()
    );

    expect(gateway.generateCalls[0].userPrompt).toBe("Extract claims from:\nQuestion: Capital of France?\nAnswer: Paris");
    expect(verification).toEqual({
      confidence: 0.9,
      sources: ["Atlas"],
      reasoning: "1/1 claims verified. The content appears to be factually accurate.",
    });
  });
});
