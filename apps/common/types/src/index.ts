export * from './chat.js';

export interface AssistantProfile {
  title: string;
  greeting: string;
  inputPlaceholder: string;
  provider: string;
  model: string;
}
