export const INSTALL_DIR = "/opt/wsl-baseline";
export const SCRIPT_DIR = `${INSTALL_DIR}/scripts`;
export const LOG_DIR = "/var/log/wsl-baseline";
export const VERIFY_SCRIPT_PATH = `${SCRIPT_DIR}/verify-baseline.sh`;
export const MAINTENANCE_SCRIPTS = ["update-system.sh", "update-images.sh", "health-check.sh", "verify-baseline.sh"] as const;

export const UPDATE_UNIT = "wsl-baseline-update";
export const SYSTEMD_DIR = "/etc/systemd/system";

export const REPO_DIR = "/etc/yum.repos.d";
export const INTERNAL_REPO_FILE = "internal-mirror.repo";
export const DISABLED_REPO_DIR = `${REPO_DIR}/disabled`;

/** Registries blocked by the registry policy. */
export const PUBLIC_REGISTRIES = ["docker.io", "quay.io", "gcr.io", "ghcr.io", "registry.k8s.io", "mcr.microsoft.com"] as const;

/** RFC 1918 private ranges. */
export const PRIVATE_RANGES = ["10.0.0.0/8", "172.16.0.0/12", "192.168.0.0/16"] as const;
export const LOOPBACK_RANGE = "127.0.0.0/8";

/** Resets the WSL runtime so .wslconfig settings (mirrored networking) take effect. */
export const RESET_RUNTIME_SCRIPT = "wsl.exe --shutdown";
