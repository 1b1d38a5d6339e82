import fs from "fs";
import { JsonObject, JsonValue, isJsonObject } from "../types";

/**
 * Read-only view of the job-search state that tool handlers hand to the model.
 * Every accessor may reject; the dispatcher turns that into an error envelope.
 */
export interface SearchContextProvider {
  getDailyTaskContext(): Promise<JsonValue>;
  getPreferencesContext(): Promise<JsonValue>;
  getExistingSourceUrls(): Promise<string[]>;
  getExistingEventUrls(): Promise<string[]>;
  getEventContext(eventId: string): Promise<JsonValue>;
  getEventFeedbackSummary(): Promise<JsonValue>;
  getContactsAtCompanies(companies: string[]): Promise<JsonValue>;
  getContactsNeedingAttention(): Promise<JsonValue>;
  getHotContacts(): Promise<JsonValue>;
  getPendingFollowUps(): Promise<JsonValue>;
  getUpcomingEventsContext(): Promise<JsonValue>;
  getContactContext(contactId: string): Promise<JsonValue>;
  getContactInteractionHistory(contactId: string): Promise<JsonValue>;
  getUserProfileContext(): Promise<JsonValue>;
  getWeeklyPerformanceHistory(): Promise<JsonValue>;
  getPipelineStatus(): Promise<JsonValue>;
  getWeeklySummaryContext(): Promise<JsonValue>;
  getGoalProgressContext(): Promise<JsonValue>;
}

export type ContextSnapshot = {
  dailyTasks?: JsonValue;
  preferences?: JsonValue;
  sourceUrls?: string[];
  eventUrls?: string[];
  events?: Record<string, JsonValue>;
  eventFeedbackSummary?: JsonValue;
  contacts?: JsonObject[];
  contactsNeedingAttention?: JsonValue;
  hotContacts?: JsonValue;
  pendingFollowUps?: JsonValue;
  upcomingEvents?: JsonValue;
  interactions?: Record<string, JsonValue>;
  userProfile?: JsonValue;
  weeklyPerformance?: JsonValue;
  pipelineStatus?: JsonValue;
  weeklySummary?: JsonValue;
  goalProgress?: JsonValue;
};

/**
 * Serves context from a fixed snapshot. Unknown events and contacts resolve to an
 * empty object.
 */
export class InMemoryContextProvider implements SearchContextProvider {
  private readonly snapshot: ContextSnapshot;

  constructor(snapshot: ContextSnapshot = {}) {
    this.snapshot = snapshot;
  }

  static fromFile(filePath: string): InMemoryContextProvider {
    const raw = fs.readFileSync(filePath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (!isJsonObject(parsed)) {
      throw new Error(`Context file ${filePath} must contain a JSON object`);
    }
    return new InMemoryContextProvider(toSnapshot(parsed));
  }

  async getDailyTaskContext(): Promise<JsonValue> {
    return this.snapshot.dailyTasks ?? {};
  }

  async getPreferencesContext(): Promise<JsonValue> {
    return this.snapshot.preferences ?? {};
  }

  async getExistingSourceUrls(): Promise<string[]> {
    return [...(this.snapshot.sourceUrls ?? [])];
  }

  async getExistingEventUrls(): Promise<string[]> {
    return [...(this.snapshot.eventUrls ?? [])];
  }

  async getEventContext(eventId: string): Promise<JsonValue> {
    return this.snapshot.events?.[eventId] ?? {};
  }

  async getEventFeedbackSummary(): Promise<JsonValue> {
    return this.snapshot.eventFeedbackSummary ?? {};
  }

  async getContactsAtCompanies(companies: string[]): Promise<JsonValue> {
    const wanted = new Set(companies.map((company) => company.trim().toLowerCase()));
    return (this.snapshot.contacts ?? []).filter((contact) => {
      const company = contact.company;
      return typeof company === "string" && wanted.has(company.trim().toLowerCase());
    });
  }

  async getContactsNeedingAttention(): Promise<JsonValue> {
    return this.snapshot.contactsNeedingAttention ?? [];
  }

  async getHotContacts(): Promise<JsonValue> {
    return this.snapshot.hotContacts ?? [];
  }

  async getPendingFollowUps(): Promise<JsonValue> {
    return this.snapshot.pendingFollowUps ?? [];
  }

  async getUpcomingEventsContext(): Promise<JsonValue> {
    return this.snapshot.upcomingEvents ?? [];
  }

  async getContactContext(contactId: string): Promise<JsonValue> {
    return (this.snapshot.contacts ?? []).find((contact) => contact.id === contactId) ?? {};
  }

  async getContactInteractionHistory(contactId: string): Promise<JsonValue> {
    return this.snapshot.interactions?.[contactId] ?? [];
  }

  async getUserProfileContext(): Promise<JsonValue> {
    return this.snapshot.userProfile ?? {};
  }

  async getWeeklyPerformanceHistory(): Promise<JsonValue> {
    return this.snapshot.weeklyPerformance ?? [];
  }

  async getPipelineStatus(): Promise<JsonValue> {
    return this.snapshot.pipelineStatus ?? {};
  }

  async getWeeklySummaryContext(): Promise<JsonValue> {
    return this.snapshot.weeklySummary ?? {};
  }

  async getGoalProgressContext(): Promise<JsonValue> {
    return this.snapshot.goalProgress ?? {};
  }
}

function toSnapshot(raw: JsonObject): ContextSnapshot {
  return {
    dailyTasks: raw.dailyTasks,
    preferences: raw.preferences,
    sourceUrls: toStringList(raw.sourceUrls),
    eventUrls: toStringList(raw.eventUrls),
    events: isJsonObject(raw.events) ? raw.events : undefined,
    eventFeedbackSummary: raw.eventFeedbackSummary,
    contacts: Array.isArray(raw.contacts) ? raw.contacts.filter(isJsonObject) : undefined,
    contactsNeedingAttention: raw.contactsNeedingAttention,
    hotContacts: raw.hotContacts,
    pendingFollowUps: raw.pendingFollowUps,
    upcomingEvents: raw.upcomingEvents,
    interactions: isJsonObject(raw.interactions) ? raw.interactions : undefined,
    userProfile: raw.userProfile,
    weeklyPerformance: raw.weeklyPerformance,
    pipelineStatus: raw.pipelineStatus,
    weeklySummary: raw.weeklySummary,
    goalProgress: raw.goalProgress
  };
}

function toStringList(value: JsonValue | undefined): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === "string");
}
