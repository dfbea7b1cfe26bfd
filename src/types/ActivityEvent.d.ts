export type ActivityType = "system" | "registry" | "execution";

export type ActivityEvent = {
  id: string;
  timestamp: string;
  type: ActivityType;
  action: string;
  detail?: string;
};
