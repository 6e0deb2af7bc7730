import { bindingRepo, bindingService } from "@/modules/bindings";
import { remoteAccountGateway } from "@/modules/remote-accounts";
import { createQuotaService, type QuotaService } from "./service";
import { createQuotaTransferEngine, type QuotaTransferEngine } from "./transfer";
import { configuredRatio } from "./units";

export * from "./units";
export * from "./transfer";
export * from "./service";

export const quotaTransferEngine: QuotaTransferEngine = createQuotaTransferEngine({
  gateway: remoteAccountGateway,
  ratio: configuredRatio,
});

export const quotaService: QuotaService = createQuotaService({
  bindings: bindingService,
  repo: bindingRepo,
  gateway: remoteAccountGateway,
  ratio: configuredRatio,
});
