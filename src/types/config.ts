/** How the installer reacts to a package that fails to install. */
export type FailureMode = "fail-fast" | "collect";

/** Whether the emulator compatibility layer is installed. */
export type WaydroidMode = "prompt" | "always" | "never";

/** Full tool configuration (config.yaml). */
export interface SetupConfig {
  paths: {
    flutter_home: string;
    android_home: string;
  };
  install: {
    refresh_index: boolean;
    failure_mode: FailureMode;
    extra_packages: string[];
    skip_packages: string[];
  };
  sdk: {
    cmdline_tools_url: string | null;
    cmdline_tools_version: string | null;
    download_page: string;
    download_base: string;
    packages: string[];
  };
  flutter: {
    repository: string;
    channel: string;
  };
  java: {
    candidates: string[];
  };
  profile: {
    file: string | null;
  };
  waydroid: {
    mode: WaydroidMode;
    aur_helper: string;
  };
  device_access: {
    enabled: boolean;
  };
  timeouts: {
    command_ceiling_seconds: number;
  };
  distro?: {
    name?: string;
    version?: string;
  };
}
