/**
 * @clockface/theme: Theme presets and resolution for clockface.
 */

export { DEFAULT_THEME, THEME_PRESETS } from "./presets.js";
export { isThemePresetName, normalizeTheme, resolveTheme } from "./resolve-theme.js";
