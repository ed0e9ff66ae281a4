/** Distribution family. Selects the package manager and user tooling. */
export type DistroFamily = "debian" | "rhel";

export type PackageManager = "apt" | "dnf";

export type FirewallBackend = "ufw" | "firewalld" | "none";

export interface DistroContext {
  readonly family: DistroFamily;
  readonly name: string;
  readonly version: string;
  readonly package_manager: PackageManager;
  readonly firewall_backend: FirewallBackend;
}
