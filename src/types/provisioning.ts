/** Port exposure rule derived from a dist.yaml `ports` entry. */
export interface PortRule {
  port: number;
  protocol?: "tcp" | "udp";
  comment?: string;
}

export interface GroupCreateParams {
  name: string;
  system?: boolean;
}

/** First entry of `groups` in dist.yaml is the primary group. */
export interface UserCreateParams {
  username: string;
  primaryGroup?: string;
  secondaryGroups?: string[];
  shell?: string;
}

/** Idempotent directory creation with ownership and mode. */
export interface DirectoryParams {
  path: string;
  owner: string;
  group: string;
  perms: number;
}
