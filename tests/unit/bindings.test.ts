/**
 * Unit Tests: Binding Service
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { bindingConfig, groupLeaveConfig, type BindingConfig } from "@/modules/bindings/config";
import { purgeOnLeave, type LeaveAnnouncer } from "@/modules/bindings/leave";
import { createBindingService, parseAccountId } from "@/modules/bindings/service";
import {
  FakeBindingRepo,
  FakeGateway,
  account,
  binding,
} from "../_utils/fakes";

const NOW = new Date("2024-06-01T00:00:00Z");
const DAY = 24 * 60 * 60 * 1000;
const ALICE = "400000000000000001";
const BOB = "400000000000000002";

function setup(config: Partial<BindingConfig> = {}) {
  const repo = new FakeBindingRepo();
  const gateway = new FakeGateway([account(10, 0, { username: "alice-site" }), account(20, 0)]);
  const leave = groupLeaveConfig.parse({ revertGroup: "default", monitoredGuildIds: ["500000000000000001"] });
  const service = createBindingService({
    repo,
    gateway,
    bindingConfig: () => ({ ...bindingConfig.parse({ bindingGroup: "linked" }), ...config }),
    groupLeaveConfig: () => leave,
  });
  return { repo, gateway, service, leave };
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseAccountId", () => {
  it("accepts only safe positive integers", () => {
    expect(parseAccountId(" 42 ")).toBe(42);
    expect(parseAccountId("0")).toBeNull();
    expect(parseAccountId("-3")).toBeNull();
    expect(parseAccountId("1.5")).toBeNull();
    expect(parseAccountId(ALICE)).toBeNull();
  });
});

describe("BindingService.lookup", () => {
  it("prefers the account id over the chat id", async () => {
    const { repo, service } = setup();
    repo.rows.set("10", binding("10", 20));
    repo.rows.set(ALICE, binding(ALICE, 10));

    expect(await service.lookup("10")).toEqual({ kind: "ACCOUNT_ID", binding: binding(ALICE, 10) });
  });

  it("falls back to the chat id", async () => {
    const { repo, service } = setup();
    repo.rows.set(ALICE, binding(ALICE, 10));

    expect(await service.lookup(ALICE)).toEqual({ kind: "CHAT_ID", binding: binding(ALICE, 10) });
    expect(await service.lookup("77")).toEqual({ kind: "NOT_FOUND" });
  });

  it("reports ERROR instead of NOT_FOUND when the store is unavailable", async () => {
    const { repo, service } = setup();
    repo.failReads = true;

    expect(await service.lookup("10")).toEqual({ kind: "ERROR", error: new Error("store down") });
    expect(await service.lookup(ALICE)).toEqual({ kind: "ERROR", error: new Error("store down") });
  });
});

describe("BindingService.bind", () => {
  it("binds and moves the remote account into the binding group", async () => {
    const { repo, gateway, service } = setup();

    const result = await service.bind(ALICE, 10, { accountCreatedAt: null, now: NOW });

    expect(result).toEqual({
      outcome: "BOUND",
      binding: { chatId: ALICE, accountId: 10, boundAt: NOW, lastCheckInAt: null },
      group: "linked",
      siteUsername: "alice-site",
    });
    expect(repo.rows.has(ALICE)).toBe(true);
    expect(gateway.accounts.get(10)?.group).toBe("linked");
  });

  it("refuses a second binding for the same user", async () => {
    const { repo, service } = setup();
    repo.rows.set(ALICE, binding(ALICE, 20));

    expect(await service.bind(ALICE, 10, { accountCreatedAt: null })).toEqual({
      outcome: "ALREADY_BOUND",
      accountId: 20,
    });
  });

  it("rejects accounts younger than the configured age", async () => {
    const { service, gateway } = setup({ minAccountAgeDays: 30 });

    const result = await service.bind(ALICE, 10, {
      accountCreatedAt: new Date(NOW.getTime() - 10 * DAY),
      now: NOW,
    });

    expect(result).toEqual({ outcome: "ACCOUNT_TOO_NEW", ageDays: 10, minAgeDays: 30 });
    expect(gateway.writes).toHaveLength(0);
  });

  it("skips the age check when the creation date is unknown", async () => {
    const { service } = setup({ minAccountAgeDays: 30 });
    expect((await service.bind(ALICE, 10, { accountCreatedAt: null, now: NOW })).outcome).toBe("BOUND");
  });

  it("rejects remote ids that do not exist", async () => {
    const { service } = setup();
    expect(await service.bind(ALICE, 99, { accountCreatedAt: null })).toEqual({
      outcome: "REMOTE_ACCOUNT_NOT_FOUND",
      accountId: 99,
    });
  });

  it("rejects an account already bound to someone else", async () => {
    const { repo, service } = setup();
    repo.rows.set(BOB, binding(BOB, 10));

    expect(await service.bind(ALICE, 10, { accountCreatedAt: null })).toEqual({
      outcome: "ACCOUNT_TAKEN",
      accountId: 10,
    });
  });

  it("rolls the binding back when the group update fails", async () => {
    const { repo, gateway, service } = setup();
    gateway.writeScript = ["rejected"];

    expect(await service.bind(ALICE, 10, { accountCreatedAt: null })).toEqual({
      outcome: "BIND_FAILED",
      accountId: 10,
    });
    expect(repo.rows.has(ALICE)).toBe(false);
    expect(gateway.accounts.get(10)?.group).toBe("default");
  });
});

describe("BindingService.purge", () => {
  it("reverts the group and deletes the binding", async () => {
    const { repo, gateway, service } = setup();
    repo.rows.set(ALICE, binding(ALICE, 10));
    gateway.accounts.set(10, account(10, 0, { group: "linked" }));

    const result = await service.purge(10);

    expect(result).toEqual({ outcome: "PURGED", binding: binding(ALICE, 10), groupReverted: true });
    expect(repo.rows.size).toBe(0);
    expect(gateway.accounts.get(10)?.group).toBe("default");
  });

  it("skips the remote write when the account is already in the revert group", async () => {
    const { repo, gateway, service } = setup();
    repo.rows.set(ALICE, binding(ALICE, 10));

    expect((await service.purge(10)).outcome).toBe("PURGED");
    expect(gateway.writes).toHaveLength(0);
  });

  it("still deletes the binding when the remote account is unreachable", async () => {
    const { repo, gateway, service } = setup();
    repo.rows.set(ALICE, binding(ALICE, 10));
    gateway.unreachable.add(10);

    expect(await service.purge(10)).toEqual({
      outcome: "PURGED",
      binding: binding(ALICE, 10),
      groupReverted: false,
    });
    expect(repo.rows.size).toBe(0);
  });

  it("returns NOT_FOUND for an unbound account", async () => {
    const { service } = setup();
    expect(await service.purge(10)).toEqual({ outcome: "NOT_FOUND", accountId: 10 });
  });
});

describe("purgeOnLeave", () => {
  const GUILD = "500000000000000001";

  it("purges and announces when a member leaves a monitored guild", async () => {
    const { repo, service, leave } = setup();
    repo.rows.set(ALICE, binding(ALICE, 10));
    const announced: Array<[string, string]> = [];
    const announcer: LeaveAnnouncer = {
      async announce(guildId, content) {
        announced.push([guildId, content]);
      },
    };

    const result = await purgeOnLeave(
      { guildId: GUILD, chatId: ALICE, username: "alice" },
      { config: () => leave, repo, bindings: service, announcer },
    );

    expect(result?.outcome).toBe("PURGED");
    expect(announced).toEqual([
      [
        GUILD,
        `alice (${ALICE}) left the server. Their linked account 10 was unbound and moved back to default.`,
      ],
    ]);
  });

  it("ignores guilds that are not monitored", async () => {
    const { repo, service, leave } = setup();
    repo.rows.set(ALICE, binding(ALICE, 10));

    const result = await purgeOnLeave(
      { guildId: "500000000000000009", chatId: ALICE, username: "alice" },
      { config: () => leave, repo, bindings: service },
    );

    expect(result).toBeNull();
    expect(repo.rows.has(ALICE)).toBe(true);
  });

  it("does nothing for members without a binding", async () => {
    const { repo, service, leave } = setup();

    const result = await purgeOnLeave(
      { guildId: GUILD, chatId: BOB, username: "bob" },
      { config: () => leave, repo, bindings: service },
    );

    expect(result).toBeNull();
  });
});
