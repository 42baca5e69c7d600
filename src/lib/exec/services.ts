export type ServiceVerb = "start" | "stop" | "restart" | "enable" | "disable";

/**
 * systemctl command lines. Queries use --quiet and report through the exit code.
 */
export const systemctl = {
  isActive: (name: string): string[] => ["systemctl", "is-active", "--quiet", name],
  isEnabled: (name: string): string[] => ["systemctl", "is-enabled", "--quiet", name],
  action: (verb: ServiceVerb, name: string): string[] => ["systemctl", verb, name],
};
