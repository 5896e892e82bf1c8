export const USER_PATHS = ['confidence', 'clarity', 'discipline'] as const;

export type UserPath = (typeof USER_PATHS)[number];
export type SyncStatus = 'pending' | 'synced';

export interface UserProfile {
  id: string;
  email: string;
  createdAt: string;
  selectedPath?: UserPath;
  displayName?: string;
  onboardingCompleted: boolean;
  streak: number;
  totalJournalEntries: number;
  updatedAt: string;
}

export interface AuthSession {
  accessToken: string;
  refreshToken: string;
  expiresAt: string;
}

export interface IdentityUser {
  id: string;
  email: string;
  createdAt: string;
}

export interface JournalEntry {
  id: string;
  userId: string;
  date: string;
  userPath: UserPath;
  title?: string;
  content: string;
  mood?: number;
  aiSummary?: string;
  aiReflection?: string;
  aiInsights: string[];
  voiceNoteUrl?: string;
  voiceTranscript?: string;
  tags: string[];
  isPrivate: boolean;
  createdAt: string;
  updatedAt: string;
  syncStatus: SyncStatus;
}

export type JournalEntryPatch = Partial<
  Pick<
    JournalEntry,
    | 'title'
    | 'content'
    | 'mood'
    | 'aiSummary'
    | 'aiReflection'
    | 'aiInsights'
    | 'voiceNoteUrl'
    | 'voiceTranscript'
    | 'tags'
    | 'isPrivate'
    | 'syncStatus'
  >
>;

export interface AnalysisResult {
  summary: string;
  insights: string[];
  reflection: string;
  mood?: number;
  suggestedTags: string[];
}

export interface MoodRange {
  min: number;
  max: number;
}

export interface EntryFilters {
  path?: UserPath;
  privateOnly: boolean;
  searchText: string;
  tags: string[];
  moodRange?: MoodRange;
}

export interface SyncBatchResult {
  synced: number;
  failed: number;
  skipped: number;
  stale: number;
}
