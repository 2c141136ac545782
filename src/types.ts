export type LanguageRef = {
  name: string;
  color: string | null;
};

export type LanguageBytes = LanguageRef & {
  bytes: number;
};

export type CommitDelta = {
  additions: number;
  deletions: number;
};

export type ContributionRecord = {
  repository: string;
  isFork: boolean;
  isPrivate: boolean;
  primaryLanguage: LanguageRef | null;
  languages: LanguageBytes[];
  commitCount: number;
  commits?: CommitDelta[];
};

export type YearSlice = {
  year: number;
  from: string;
  to: string;
};

export type YearBundle = YearSlice & {
  records: ContributionRecord[];
};

export type RecordFilters = {
  excludeForks: boolean;
  excludePrivate: boolean;
  minCommits: number;
};

export type Bucket = {
  commits: number;
  additions: number;
  deletions: number;
};

export type LanguageStat = {
  name: string;
  color: string;
  direct: Bucket;
  weighted: Bucket;
  bytes: number;
  repositories: ReadonlySet<string>;
};

export type RunTotals = {
  commits: number;
  additions: number;
  deletions: number;
  repositories: number;
};

export type YearSummary = {
  year: number;
  commits: number;
  languages: Array<{ name: string; commits: number }>;
};

export type RepositorySummary = {
  name: string;
  commits: number;
  additions: number;
  deletions: number;
  primaryLanguage: string | null;
  isFork: boolean;
  isPrivate: boolean;
};

export type Analysis = {
  period: { from: string; to: string };
  totals: RunTotals;
  languages: LanguageStat[];
  years: YearSummary[];
  repositories: RepositorySummary[];
  failedSlices: number[];
};

export type UserProfile = {
  login: string;
  name: string;
  bio: string;
  company: string;
  location: string;
  email: string;
  website: string;
  twitter: string;
  createdAt: string;
  followers: number;
  following: number;
  ownedRepositories: number;
  contributedRepositories: number;
  starredRepositories: number;
  publicRepositories: number;
  totalStars: number;
  totalForks: number;
  totalIssues: number;
  totalPullRequests: number;
  totalReviews: number;
};

export type Theme = "dark" | "light";

export type CardStyle = "neofetch" | "terminal";

export type ProfileField = {
  key: string;
  value: string;
};

export type Logger = Pick<Console, "log" | "warn" | "error">;
