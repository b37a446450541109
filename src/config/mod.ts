/**
 * 設定モジュールのエクスポート
 */

export {
  ConfigLoadError,
  ConfigMissingError,
  ensureRuleFile,
  loadRuleFile,
  writeConfigTemplate,
} from "./loader.js";

export { expandTilde } from "./env.js";
