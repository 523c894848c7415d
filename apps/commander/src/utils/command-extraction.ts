import { COMMAND_MARKER } from "../prompt/system-prompt";

export interface ExtractedReply {
  prose: string;
  commands: string[];
}

/**
 * Split a completion into visible prose and marked command lines.
 * A line is a command when its trimmed text starts with the marker.
 */
export function extractCommands(reply: string): ExtractedReply {
  const commands: string[] = [];
  const proseLines: string[] = [];

  for (const line of reply.split("\n")) {
    if (line.trim().startsWith(COMMAND_MARKER)) {
      const command = line.replaceAll(COMMAND_MARKER, "").trim();
      if (command) {
        commands.push(command);
      }
    } else {
      proseLines.push(line);
    }
  }

  return { prose: proseLines.join("\n").trim(), commands };
}
