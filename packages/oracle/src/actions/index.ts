import {executeSlash} from "./executeSlash.js";
import {Action, ActionName} from "./interface.js";
import {requestSlash} from "./requestSlash.js";

export * from "./interface.js";
export {crossCheckSystem} from "./checks.js";
export {executeSlash, requestSlash};

export const actions: Record<ActionName, Action> = {
  [ActionName.requestSlash]: requestSlash,
  [ActionName.executeSlash]: executeSlash,
};
