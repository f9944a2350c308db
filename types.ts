export type IssueState = 'open' | 'closed';

export type UserRole = 'owner' | 'member' | 'collaborator' | 'contributor' | 'none';

export type OutputFormat = 'table' | 'json' | 'csv';

export type Granularity = 'daily' | 'weekly' | 'monthly';

export interface User {
  id: number;
  username: string;
  displayName: string | null;
  avatarUrl: string | null;
  isBot: boolean;
}

export interface Label {
  id: number;
  name: string;
  color: string;
  description: string | null;
}

export interface Comment {
  id: number;
  body: string;
  author: User | null;  // null when the account was deleted
  authorRole: UserRole;
  createdAt: Date;
  updatedAt: Date;
  issueNumber: number;
}

export interface Issue {
  id: number;
  number: number;
  title: string;
  body: string | null;
  state: IssueState;
  createdAt: Date;
  updatedAt: Date;
  closedAt: Date | null;
  author: User;
  authorRole: UserRole;
  assignees: User[];
  labels: Label[];
  commentCount: number;
  comments: Comment[];
  isPullRequest: boolean;
  url: string;
}

export interface Repository {
  owner: string;
  name: string;
  fullName: string;
  url: string;
  apiUrl: string;
  isPublic: boolean;
  defaultBranch: string;
  description: string | null;
  openIssuesCount: number;
  stars: number;
}

export interface FilterCriteria {
  minComments?: number;
  maxComments?: number;
  state?: IssueState;
  labels: string[];
  anyLabels: boolean;
  assignees: string[];
  anyAssignees: boolean;
  createdSince?: Date;
  createdUntil?: Date;
  updatedSince?: Date;
  updatedUntil?: Date;
  limit?: number;
  includeComments: boolean;
}

export interface LabelCount {
  name: string;
  count: number;
}

export interface UserActivity {
  username: string;
  issuesCreated: number;
  commentsMade: number;
  role: UserRole;
}

export interface CommentDistribution {
  '0-5': number;
  '6-10': number;
  '11+': number;
}

export interface ActivityMetrics {
  totalIssuesAnalyzed: number;
  issuesMatchingFilters: number;
  averageCommentCount: number;
  commentDistribution: CommentDistribution;
  topLabels: LabelCount[];
  activityByDay: Record<string, number>;
  activityByWeek: Record<string, number>;
  activityByMonth: Record<string, number>;
  mostActiveUsers: UserActivity[];
  averageResolutionDays: number | null;
  trendingLabels: LabelCount[];
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: Date;
}

export interface AnalysisResult {
  readonly issues: readonly Issue[];
  readonly repository: Repository;
  readonly criteria: FilterCriteria;
  readonly metrics: ActivityMetrics;
  readonly totalIssuesAvailable: number;
  readonly elapsedSeconds: number;
  readonly generatedAt: Date;
  readonly warnings: readonly string[];
}

export interface TrendingSettings {
  windowDays?: number;
  growthThreshold: number;
  minOccurrences: number;
}

export interface AnalyzerSettings {
  activeUserLimit: number;
  topLabelLimit: number;
  trending: TrendingSettings;
}
