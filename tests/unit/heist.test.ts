/**
 * Unit Tests: Heist Orchestrator
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { groupLeaveConfig, bindingConfig } from "@/modules/bindings/config";
import { createBindingService } from "@/modules/bindings/service";
import { heistConfig, type HeistConfig } from "@/modules/heist/config";
import { createHeistService } from "@/modules/heist/service";
import type { HeistLedgerEntry } from "@/modules/heist/types";
import { createQuotaTransferEngine } from "@/modules/quota/transfer";
import type { Binding } from "@/modules/bindings";
import { ErrResult } from "@/utils/result";
import type { RandomSource } from "@/utils/rng";
import {
  FakeBindingRepo,
  FakeGateway,
  FakeLedger,
  account,
  binding,
  scriptedRandom,
} from "../_utils/fakes";

const RATIO = 100;
const NOW = new Date("2024-05-01T12:00:00Z");
const ROBBER = "200000000000000001";
const VICTIM = "200000000000000002";
const OTHER = "200000000000000003";

type Setup = {
  config?: Partial<HeistConfig>;
  robberQuota?: number;
  victimQuota?: number;
  rng?: RandomSource;
};

function setup({ config = {}, robberQuota = 100_000, victimQuota = 100_000, rng = scriptedRandom([]) }: Setup = {}) {
  const repo = new FakeBindingRepo([binding(ROBBER, 1), binding(VICTIM, 2)]);
  const gateway = new FakeGateway([account(1, robberQuota), account(2, victimQuota)]);
  const ledger = new FakeLedger();
  const resolved = { ...heistConfig.parse({ enabled: true }), ...config };
  const bindings = createBindingService({
    repo,
    gateway,
    bindingConfig: () => bindingConfig.parse({ quotaDisplayRatio: RATIO }),
    groupLeaveConfig: () => groupLeaveConfig.parse({}),
  });
  const service = createHeistService({
    config: () => resolved,
    bindings,
    repo,
    ledger,
    transfers: createQuotaTransferEngine({ gateway, ratio: () => RATIO }),
    rng,
    now: () => NOW,
  });
  return { repo, gateway, ledger, service };
}

const entry = (overrides: Partial<HeistLedgerEntry>): HeistLedgerEntry => ({
  robberChatId: OTHER,
  victimAccountId: 2,
  outcome: "SUCCESS",
  amount: 100,
  heistAt: NOW,
  ...overrides,
});

describe("HeistService.executeHeist guards", () => {
  it("returns DISABLED when the feature is off", async () => {
    const { service, gateway } = setup({ config: { enabled: false } });
    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "DISABLED" });
    expect(gateway.writes).toHaveLength(0);
  });

  it("requires the robber to be bound", async () => {
    const { service } = setup();
    expect(await service.executeHeist(OTHER, VICTIM)).toEqual({ outcome: "ROBBER_NOT_BOUND" });
  });

  it("checks the binding before the attempt limit", async () => {
    const { service, ledger } = setup({ config: { maxAttemptsPerDay: 2 } });
    ledger.entries.push(entry({ outcome: "FAILURE" }), entry({ outcome: "FAILURE" }));

    expect(await service.executeHeist(OTHER, VICTIM)).toEqual({ outcome: "ROBBER_NOT_BOUND" });
  });

  it("reports an unknown victim with the identifier that was looked up", async () => {
    const { service } = setup();
    expect(await service.executeHeist(ROBBER, "999")).toEqual({
      outcome: "VICTIM_NOT_FOUND",
      victimIdentifier: "999",
    });
  });

  it("rejects self-heists even through the account id", async () => {
    const { service } = setup();
    expect(await service.executeHeist(ROBBER, "1")).toEqual({ outcome: "CANNOT_ROB_SELF" });
    expect(await service.executeHeist(ROBBER, ROBBER)).toEqual({ outcome: "CANNOT_ROB_SELF" });
  });

  it("stops a robber who used up today's attempts", async () => {
    const { service, ledger } = setup();
    ledger.entries.push(entry({ robberChatId: ROBBER, victimAccountId: 7, outcome: "FAILURE" }));

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "ATTEMPTS_EXCEEDED" });
  });

  it("protects a victim after the daily number of successful heists", async () => {
    const { service, ledger } = setup();
    ledger.entries.push(entry({}), entry({ outcome: "CRITICAL" }), entry({}));

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({
      outcome: "DEFENSES_EXCEEDED",
      victimAccountId: 2,
    });
  });

  it("checks attempts before defenses", async () => {
    const { service, ledger } = setup();
    ledger.entries.push(entry({}), entry({}), entry({}), entry({ robberChatId: ROBBER, victimAccountId: 9 }));

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "ATTEMPTS_EXCEEDED" });
  });

  it("does not count failed heists as breached defenses", async () => {
    const { service, ledger } = setup({ rng: scriptedRandom([0.9, 0.5, 0.9]) });
    ledger.entries.push(
      entry({ outcome: "FAILURE", amount: -100 }),
      entry({ outcome: "FAILURE", amount: -100 }),
      entry({ outcome: "FAILURE", amount: -100 }),
    );

    expect((await service.executeHeist(ROBBER, VICTIM)).outcome).toBe("SUCCESS");
  });
});

describe("HeistService.executeHeist settlement", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("charges the penalty to the robber on failure and logs a negative amount", async () => {
    const { service, gateway, ledger } = setup({ rng: scriptedRandom([0.1]) });

    const result = await service.executeHeist(ROBBER, VICTIM);

    expect(result).toEqual({ outcome: "FAILURE", penalty: 100, victimAccountId: 2 });
    expect(gateway.quotaOf(1)).toBe(90_000);
    expect(gateway.quotaOf(2)).toBe(110_000);
    expect(ledger.entries).toEqual([
      { robberChatId: ROBBER, victimAccountId: 2, outcome: "FAILURE", amount: -10_000, heistAt: NOW },
    ]);
  });

  it("returns API_ERROR and logs nothing when the robber cannot pay the penalty", async () => {
    const { service, gateway, ledger } = setup({ robberQuota: 5_000, rng: scriptedRandom([0.1]) });

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "API_ERROR" });
    expect(gateway.writes).toHaveLength(0);
    expect(ledger.entries).toHaveLength(0);
  });

  it("moves the drawn amount to the robber on success", async () => {
    const { service, gateway, ledger } = setup({ rng: scriptedRandom([0.9, 0.5, 0.9]) });

    const result = await service.executeHeist(ROBBER, VICTIM);

    expect(result).toEqual({ outcome: "SUCCESS", gain: 22.5, victimAccountId: 2 });
    expect(gateway.quotaOf(1)).toBe(102_250);
    expect(gateway.quotaOf(2)).toBe(97_750);
    expect(ledger.entries[0]).toMatchObject({ outcome: "SUCCESS", amount: 2_250 });
  });

  it("reports CRITICAL when the doubled amount is fully paid", async () => {
    const { service, ledger } = setup({ rng: scriptedRandom([0.9, 0, 0.05]) });

    expect(await service.executeHeist(ROBBER, "2")).toEqual({
      outcome: "CRITICAL",
      gain: 10,
      victimAccountId: 2,
    });
    expect(ledger.entries[0]).toMatchObject({ outcome: "CRITICAL", amount: 1_000 });
  });

  it("keeps CRITICAL when a clamped gain still beats the base amount", async () => {
    const { service } = setup({ victimQuota: 700, rng: scriptedRandom([0.9, 0, 0.05]) });

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({
      outcome: "CRITICAL",
      gain: 7,
      victimAccountId: 2,
    });
  });

  it("downgrades a critical to SUCCESS when the victim's balance caps it at the base", async () => {
    const { service, gateway, ledger } = setup({ victimQuota: 400, rng: scriptedRandom([0.9, 0, 0.05]) });

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({
      outcome: "SUCCESS",
      gain: 4,
      victimAccountId: 2,
    });
    expect(gateway.quotaOf(2)).toBe(0);
    expect(ledger.entries[0]).toMatchObject({ outcome: "SUCCESS", amount: 400 });
  });

  it("records a zero-amount success against an empty victim", async () => {
    const { service, gateway, ledger } = setup({ victimQuota: 0, rng: scriptedRandom([0.9, 0.5, 0.9]) });

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({
      outcome: "SUCCESS",
      gain: 0,
      victimAccountId: 2,
    });
    expect(gateway.writes).toHaveLength(0);
    expect(ledger.entries[0]).toMatchObject({ outcome: "SUCCESS", amount: 0 });
  });

  it("returns API_ERROR without a ledger entry when the transfer fails", async () => {
    const { service, gateway, ledger } = setup({ rng: scriptedRandom([0.9, 0.5, 0.9]) });
    gateway.writeScript = ["rejected"];

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "API_ERROR" });
    expect(ledger.entries).toHaveLength(0);
  });

  it("restores the victim and logs nothing when the credit leg is rejected", async () => {
    const { service, gateway, ledger } = setup({ rng: scriptedRandom([0.9, 0.5, 0.9]) });
    gateway.writeScript = ["ok", "rejected"];

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "API_ERROR" });
    expect(ledger.entries).toHaveLength(0);
    expect(gateway.writes.map((w) => [w.id, w.quota])).toEqual([
      [2, 97_750],
      [1, 102_250],
      [2, 100_000],
    ]);
    expect(gateway.quotaOf(1)).toBe(100_000);
    expect(gateway.quotaOf(2)).toBe(100_000);
  });

  it("logs nothing when both the credit leg and the restore fail", async () => {
    const { service, gateway, ledger } = setup({ rng: scriptedRandom([0.9, 0.5, 0.9]) });
    gateway.writeScript = ["ok", "rejected", "error"];

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "API_ERROR" });
    expect(ledger.entries).toHaveLength(0);
    expect(gateway.writes).toHaveLength(3);
    expect(gateway.quotaOf(1)).toBe(100_000);
    expect(gateway.quotaOf(2)).toBe(97_750);
  });

  it("records a zero penalty as a plain zero", async () => {
    const { service, ledger } = setup({ config: { failurePenalty: 0 }, rng: scriptedRandom([0.1]) });

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({
      outcome: "FAILURE",
      penalty: 0,
      victimAccountId: 2,
    });
    expect(ledger.entries[0]?.amount).toBe(0);
  });

  it("returns API_ERROR when the victim lookup cannot reach the store", async () => {
    const { service, repo, gateway } = setup();
    vi.spyOn(repo, "findByAccountId").mockResolvedValue(ErrResult<Binding | null>(new Error("store down")));

    expect(await service.executeHeist(ROBBER, "2")).toEqual({ outcome: "API_ERROR" });
    expect(gateway.writes).toHaveLength(0);
  });

  it("returns API_ERROR when the ledger cannot be counted", async () => {
    const { service, ledger, gateway } = setup();
    ledger.failCounts = true;

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "API_ERROR" });
    expect(gateway.writes).toHaveLength(0);
  });

  it("turns an unexpected throw into API_ERROR", async () => {
    const { service, ledger } = setup({ rng: scriptedRandom([]) });

    expect(await service.executeHeist(ROBBER, VICTIM)).toEqual({ outcome: "API_ERROR" });
    expect(ledger.entries).toHaveLength(0);
  });
});
