import { z } from "zod";
import { loadConfiguration, updateConfiguration } from "../data/resultRepository.js";
import type { ConfigurationSnapshot } from "../schema/configuration.js";
import {
  APPEARANCE_OPTION_LABELS,
  VOLUME_UNIT_LABELS,
  appearanceOptionSchema,
  volumeUnitSchema,
} from "../schema/units.js";
import { defineTool, type ToolContext } from "./types.js";

const settingsSchema = z.object({
  preferredVolumeUnit: volumeUnitSchema,
  preferredVolumeUnitLabel: z.string(),
  appearance: appearanceOptionSchema,
  appearanceLabel: z.string(),
});

type SettingsView = z.infer<typeof settingsSchema>;

function toSettingsView(snapshot: ConfigurationSnapshot): SettingsView {
  return {
    preferredVolumeUnit: snapshot.preferredVolumeUnit,
    preferredVolumeUnitLabel: VOLUME_UNIT_LABELS[snapshot.preferredVolumeUnit],
    appearance: snapshot.appearance,
    appearanceLabel: APPEARANCE_OPTION_LABELS[snapshot.appearance],
  };
}

const settingsGetInputSchema = z.object({});
const settingsGetOutputSchema = z.object({ settings: settingsSchema });

export type SettingsGetInput = z.infer<typeof settingsGetInputSchema>;
export type SettingsGetOutput = z.infer<typeof settingsGetOutputSchema>;

export const settingsGetTool = defineTool<SettingsGetInput, SettingsGetOutput>({
  name: "settings_get",
  description: "Read the preferred volume unit and appearance option.",
  inputSchema: settingsGetInputSchema,
  outputSchema: settingsGetOutputSchema,
  handler: async (_input: SettingsGetInput, context: ToolContext) => {
    const configuration = await loadConfiguration();
    context.logger?.info("Read settings");
    return { settings: toSettingsView(configuration.snapshot()) };
  },
});

const settingsUpdateInputSchema = z.object({
  preferredVolumeUnit: volumeUnitSchema.optional(),
  appearance: appearanceOptionSchema.optional(),
});

const settingsUpdateOutputSchema = z.object({ settings: settingsSchema });

export type SettingsUpdateInput = z.infer<typeof settingsUpdateInputSchema>;
export type SettingsUpdateOutput = z.infer<typeof settingsUpdateOutputSchema>;

export const settingsUpdateTool = defineTool<SettingsUpdateInput, SettingsUpdateOutput>({
  name: "settings_update",
  description: "Change the preferred volume unit and/or the appearance option. Omitted options keep their value.",
  inputSchema: settingsUpdateInputSchema,
  outputSchema: settingsUpdateOutputSchema,
  handler: async (input: SettingsUpdateInput, context: ToolContext) => {
    const snapshot = await updateConfiguration((configuration) => {
      if (input.preferredVolumeUnit) {
        configuration.setPreferredVolumeUnit(input.preferredVolumeUnit);
      }
      if (input.appearance) {
        configuration.setAppearance(input.appearance);
      }
    });

    context.logger?.info("Updated settings", snapshot);
    return { settings: toSettingsView(snapshot) };
  },
});
