// pattern: Functional Core

/**
 * A named set of compatibility-layer tweaks applied when a prefix is created
 */
export interface Profile {
  /** winetricks verb selecting the reported Windows version */
  windowsVersion: string;
  /** Runtime libraries and fonts installed with winetricks */
  dependencyPackages: readonly string[];
  /** Graphics translation layers installed with winetricks */
  graphicsPackages: readonly string[];
}

export const DEFAULT_PROFILE = "general";

export const PROFILES: Readonly<Record<string, Profile>> = {
  general: {
    windowsVersion: "win10",
    dependencyPackages: ["corefonts", "vcrun2019"],
    graphicsPackages: ["dxvk", "vkd3d"],
  },
  dotnet: {
    windowsVersion: "win10",
    dependencyPackages: ["corefonts", "vcrun2019", "dotnet48"],
    graphicsPackages: ["dxvk", "vkd3d"],
  },
  games: {
    windowsVersion: "win10",
    dependencyPackages: ["corefonts"],
    graphicsPackages: ["dxvk", "vkd3d"],
  },
};

export function getProfile(name: string): Profile | undefined {
  return Object.hasOwn(PROFILES, name) ? PROFILES[name] : undefined;
}

export function listProfiles(): string[] {
  return Object.keys(PROFILES);
}
