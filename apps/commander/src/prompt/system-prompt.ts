export const COMMAND_MARKER = "COMMAND:";

const OS_NAMES = {
  windows: "Windows",
  linux: "Linux",
} as const;

export function getSystemPrompt(osType: keyof typeof OS_NAMES): string {
  return `You are an assistant that helps run commands on ${OS_NAMES[osType]}.
When a command needs to be executed, put it on its own line in the form:
${COMMAND_MARKER} <command>
Use one line per command. Everything else you write is shown to the user as-is.`;
}

export function withHistory(systemPrompt: string, context: string): string {
  if (!context) return systemPrompt;
  return `${systemPrompt}

History:
${context}`;
}
