import { z } from "zod";
import { logger } from "../logger.js";
import {
  appearanceOptionSchema,
  volumeUnitSchema,
  type AppearanceOption,
  type VolumeUnit,
} from "./units.js";

export interface ConfigurationSnapshot {
  preferredVolumeUnit: VolumeUnit;
  appearance: AppearanceOption;
}

export const DEFAULT_CONFIGURATION: Readonly<ConfigurationSnapshot> = Object.freeze({
  preferredVolumeUnit: "gallons",
  appearance: "system",
});

const storedConfigurationSchema = z
  .object({
    preferredVolumeUnit: z.unknown(),
    appearance: z.unknown(),
  })
  .partial();

/**
 * Session settings. Each option always holds one valid value; the setters
 * reject anything else.
 */
export class Configuration {
  private unit: VolumeUnit;
  private appearanceOption: AppearanceOption;

  constructor(initial: Partial<ConfigurationSnapshot> = {}) {
    this.unit = volumeUnitSchema.parse(initial.preferredVolumeUnit ?? DEFAULT_CONFIGURATION.preferredVolumeUnit);
    this.appearanceOption = appearanceOptionSchema.parse(initial.appearance ?? DEFAULT_CONFIGURATION.appearance);
  }

  /**
   * Restores settings read by the storage layer. Unknown or malformed values
   * fall back to the default for that option.
   */
  static fromStored(value: unknown): Configuration {
    const parsed = storedConfigurationSchema.safeParse(value ?? {});
    if (!parsed.success) {
      logger.warn("Ignoring unreadable stored settings", "configuration", { issues: parsed.error.issues });
      return new Configuration();
    }

    const unit = volumeUnitSchema.safeParse(parsed.data.preferredVolumeUnit);
    const appearance = appearanceOptionSchema.safeParse(parsed.data.appearance);

    if (parsed.data.preferredVolumeUnit !== undefined && !unit.success) {
      logger.warn("Stored volume unit is not recognised; using default", "configuration", {
        value: parsed.data.preferredVolumeUnit,
      });
    }
    if (parsed.data.appearance !== undefined && !appearance.success) {
      logger.warn("Stored appearance is not recognised; using default", "configuration", {
        value: parsed.data.appearance,
      });
    }

    return new Configuration({
      preferredVolumeUnit: unit.success ? unit.data : undefined,
      appearance: appearance.success ? appearance.data : undefined,
    });
  }

  get preferredVolumeUnit(): VolumeUnit {
    return this.unit;
  }

  setPreferredVolumeUnit(unit: VolumeUnit): void {
    this.unit = volumeUnitSchema.parse(unit);
  }

  get appearance(): AppearanceOption {
    return this.appearanceOption;
  }

  setAppearance(option: AppearanceOption): void {
    this.appearanceOption = appearanceOptionSchema.parse(option);
  }

  snapshot(): ConfigurationSnapshot {
    return {
      preferredVolumeUnit: this.unit,
      appearance: this.appearanceOption,
    };
  }
}
