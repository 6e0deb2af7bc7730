/**
 * Check-in Engine.
 *
 * Purpose: grant a randomized quota once per local day.
 *
 * Invariants:
 * - The timestamp is persisted only after the remote write succeeded, so a failed
 *   check-in can be retried the same day.
 * - The stored timestamp is the UTC instant; `timezoneOffsetHours` only moves the
 *   day boundary.
 */
import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";
import type { ChatId } from "@/db/types";
import { bindingRepo, type Binding, type BindingRepo } from "@/modules/bindings";
import { configuredRatio, toDisplay, toRaw } from "@/modules/quota";
import {
  remoteAccountGateway,
  type RemoteAccountGateway,
} from "@/modules/remote-accounts";
import { mathRandom, type RandomSource, uniform } from "@/utils/rng";
import type { CheckInConfig } from "./config";
import type { CheckInResult } from "./types";

const MS_PER_HOUR = 60 * 60 * 1000;

/** `YYYY-MM-DD` of `instant` shifted by a fixed number of hours. */
export function localDay(instant: Date, offsetHours: number): string {
  return new Date(instant.getTime() + offsetHours * MS_PER_HOUR).toISOString().slice(0, 10);
}

export interface CheckInService {
  /** `binding` skips the lookup when the caller already loaded it. */
  performCheckIn(chatId: ChatId, binding?: Binding): Promise<CheckInResult>;
}

export type CheckInServiceDeps = {
  config: () => CheckInConfig;
  ratio: () => number;
  repo: Pick<BindingRepo, "findByChatId" | "setLastCheckIn">;
  gateway: RemoteAccountGateway;
  rng?: RandomSource;
  now?: () => Date;
};

class CheckInServiceImpl implements CheckInService {
  private readonly rng: RandomSource;
  private readonly now: () => Date;

  constructor(private readonly deps: CheckInServiceDeps) {
    this.rng = deps.rng ?? mathRandom;
    this.now = deps.now ?? (() => new Date());
  }

  async performCheckIn(chatId: ChatId, preloaded?: Binding): Promise<CheckInResult> {
    const config = this.deps.config();
    if (!config.enabled) return { outcome: "DISABLED" };

    let binding = preloaded ?? null;
    if (!binding) {
      const found = await this.deps.repo.findByChatId(chatId);
      if (found.isErr()) console.error("[CheckIn] binding lookup failed:", found.error);
      binding = found.unwrapOr(null);
    }
    if (!binding) return { outcome: "NOT_BOUND" };

    const now = this.now();
    const offset = config.timezoneOffsetHours;
    const isFirst = binding.lastCheckInAt === null;
    if (binding.lastCheckInAt && localDay(binding.lastCheckInAt, offset) === localDay(now, offset)) {
      return { outcome: "ALREADY_CHECKED_IN" };
    }

    const ratio = this.deps.ratio();
    let bonus = 0;
    let isDoubled = false;
    if (isFirst && config.firstCheckInBonusEnabled) {
      bonus = toRaw(config.firstCheckInBonusDisplayQuota, ratio);
    } else {
      isDoubled = this.rng() < config.doubleChance;
    }

    const base = toRaw(uniform(this.rng, config.minDisplayQuota, config.maxDisplayQuota), ratio);
    const regular = isDoubled ? base * 2 : base;
    const granted = regular + bonus;

    const account = (await this.deps.gateway.fetchAccount(binding.accountId)).unwrapOr(null);
    if (!account) return { outcome: "API_USER_NOT_FOUND" };

    const total = account.quota + granted;
    const written = (await this.deps.gateway.replaceAccount({ ...account, quota: total })).unwrapOr(
      false,
    );
    if (!written) return { outcome: "API_UPDATE_FAILED" };

    const stamped = await this.deps.repo.setLastCheckIn(chatId, now);
    if (stamped.isErr()) {
      console.error("[CheckIn] quota granted but timestamp not saved", {
        chatId,
        accountId: binding.accountId,
        error: stamped.error,
      });
    }

    return {
      outcome: "SUCCESS",
      isFirst,
      isDoubled,
      displayAdded: toDisplay(granted, ratio),
      displayTotal: toDisplay(total, ratio),
      chatId,
      accountId: binding.accountId,
    };
  }
}

export function createCheckInService(deps: CheckInServiceDeps): CheckInService {
  return new CheckInServiceImpl(deps);
}

export const checkInService: CheckInService = createCheckInService({
  config: () => configStore.get(ConfigurableModule.CheckIn),
  ratio: configuredRatio,
  repo: bindingRepo,
  gateway: remoteAccountGateway,
});
