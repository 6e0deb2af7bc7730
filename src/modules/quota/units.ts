import { configStore } from "@/configuration";
import { ConfigurableModule } from "@/configuration/constants";

/** Display quota to raw quota, truncating toward zero. */
export const toRaw = (display: number, ratio: number): number => Math.trunc(display * ratio);

export const toDisplay = (raw: number, ratio: number): number => raw / ratio;

/** Ratio currently configured under `binding.quotaDisplayRatio`. */
export const configuredRatio = (): number =>
  configStore.get(ConfigurableModule.Binding).quotaDisplayRatio;
