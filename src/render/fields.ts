import type { ProfileField, UserProfile } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Account age as "N years, N months, N days" (365-day years, 30-day months). */
export const formatUptime = (createdAt: string, now: Date): string => {
  const created = new Date(createdAt);
  if (Number.isNaN(created.getTime())) return "";
  const days = Math.max(0, Math.floor((now.getTime() - created.getTime()) / DAY_MS));
  const years = Math.floor(days / 365);
  const months = Math.floor((days % 365) / 30);
  const rest = (days % 365) % 30;
  return `${years} years, ${months} months, ${rest} days`;
};

export const defaultProfileFields = (profile: UserProfile, now: Date): ProfileField[] => {
  const fields: ProfileField[] = [
    { key: "Uptime", value: formatUptime(profile.createdAt, now) },
    { key: "Host", value: profile.company },
    { key: "Location", value: profile.location },
    { key: "Website", value: profile.website },
  ];
  return fields.filter((field) => field.value !== "");
};

export const contactFields = (profile: UserProfile): ProfileField[] => {
  const fields: ProfileField[] = [
    { key: "Email", value: profile.email },
    { key: "Twitter", value: profile.twitter ? `@${profile.twitter}` : "" },
  ];
  return fields.filter((field) => field.value !== "");
};

/**
 * The first custom field with a default's key takes that default's place; every other custom
 * field is appended, so repeated keys are allowed.
 */
export const mergeFields = (defaults: ProfileField[], custom: ProfileField[]): ProfileField[] => {
  const merged = [...defaults];
  const replaced = new Set<string>();
  for (const field of custom) {
    const index = defaults.findIndex((item) => item.key === field.key);
    if (index >= 0 && !replaced.has(field.key)) {
      merged[index] = field;
      replaced.add(field.key);
    } else {
      merged.push(field);
    }
  }
  return merged;
};
