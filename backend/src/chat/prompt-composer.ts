export const NETWORK_ASSISTANT_INSTRUCTION = [
  'You are a helpful and expert network troubleshooting assistant.',
  'Use the following information to guide the user and provide a detailed, step-by-step solution.',
  'Do not invent information beyond the context or your general knowledge.',
].join(' ');

/**
 * 固定布局：角色说明 → Context → User's request
 */
export function composePrompt(
  instruction: string,
  retrieved: string,
  userText: string,
): string {
  if (userText.trim().length === 0) {
    throw new Error('userText must not be empty');
  }

  return [
    instruction,
    `Context:\n${retrieved}`,
    `User's request:\n${userText}`,
  ].join('\n\n');
}
