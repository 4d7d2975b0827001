export type AgentType = 'emailAi' | 'searchAi' | 'general';

export interface BotDefinition {
  agentType: AgentType;
  id: string;
  username: string;
  displayName: string;
  email: string;
}

// Fixed ids so every deployment agrees on who the bots are
export const EMAIL_AI_BOT: BotDefinition = {
  agentType: 'emailAi',
  id: '00000000-0000-0000-0000-000000000001',
  username: 'email-ai',
  displayName: 'Email AI',
  email: 'emailai@bots.local',
};

export const SEARCH_AI_BOT: BotDefinition = {
  agentType: 'searchAi',
  id: '00000000-0000-0000-0000-000000000002',
  username: 'search-ai',
  displayName: 'Search AI',
  email: 'searchai@bots.local',
};

export const GENERAL_AI_BOT: BotDefinition = {
  agentType: 'general',
  id: '00000000-0000-0000-0000-000000000003',
  username: 'general-ai',
  displayName: 'General AI',
  email: 'general@bots.local',
};

export const BOTS: readonly BotDefinition[] = [EMAIL_AI_BOT, SEARCH_AI_BOT, GENERAL_AI_BOT];

export function botForAgent(agentType: AgentType): BotDefinition {
  return BOTS.find((b) => b.agentType === agentType) ?? GENERAL_AI_BOT;
}
