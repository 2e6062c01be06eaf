import os from "node:os";
import path from "node:path";

export const APP_DIR_NAME = "meterwatch";

export function defaultConfigDir(): string {
  if (process.platform === "win32") {
    const base = process.env.APPDATA;
    if (base && base.trim()) return base;
  }
  const xdg = process.env.XDG_CONFIG_HOME;
  if (xdg && xdg.trim()) return xdg;
  return path.join(os.homedir(), ".config");
}

export function defaultDataDir(): string {
  if (process.platform === "win32") {
    const base = process.env.LOCALAPPDATA;
    if (base && base.trim()) return base;
  }
  const xdg = process.env.XDG_DATA_HOME;
  if (xdg && xdg.trim()) return xdg;
  return path.join(os.homedir(), ".local", "share");
}

export function appConfigPath(fileName: string): string {
  return path.join(defaultConfigDir(), APP_DIR_NAME, fileName);
}

export function appDataPath(fileName: string): string {
  return path.join(defaultDataDir(), APP_DIR_NAME, fileName);
}
