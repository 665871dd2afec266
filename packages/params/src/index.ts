import {ParamsError, ParamsErrorCode} from "./errors.js";
import {SlashingParams} from "./interface.js";
import {PresetName} from "./presetName.js";
import {mainnetPreset} from "./presets/mainnet.js";
import {minimalPreset} from "./presets/minimal.js";
import {validateSlashingParams} from "./utils.js";

export * from "./constants.js";
export * from "./errors.js";
export {type SlashingParams, type SlashingParamKey, slashingParamTypes} from "./interface.js";
export {paramsFromJson, paramsToJson} from "./json.js";
export {captureWindow, validateSlashingParams} from "./utils.js";
export {PresetName, mainnetPreset, minimalPreset};

export const presets: Record<PresetName, SlashingParams> = {
  [PresetName.mainnet]: mainnetPreset,
  [PresetName.minimal]: minimalPreset,
};

export function isPresetName(name: string): name is PresetName {
  return Object.values<string>(PresetName).includes(name);
}

/**
 * Resolve the params of a preset with `overrides` applied on top, throws if the result is inconsistent
 */
export function getSlashingParams(
  preset: PresetName | string = PresetName.mainnet,
  overrides: Partial<SlashingParams> = {}
): SlashingParams {
  if (!isPresetName(preset)) {
    throw new ParamsError({code: ParamsErrorCode.UNKNOWN_PRESET, preset});
  }

  const params: SlashingParams = {...presets[preset]};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(params, {[key]: value});
    }
  }

  validateSlashingParams(params);
  return params;
}
