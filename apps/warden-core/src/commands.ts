export const PREFIX_COMMAND = "prefix";

export type ParsedCommand = {
  name: string;
  argument: string;
};

/**
 * Splits `<prefix><name> [argument]` into its parts. The argument is the
 * whole remainder of the line, so a multi-token argument reaches the command
 * intact and can be rejected there.
 */
export const parseCommand = (
  content: string,
  prefix: string,
): ParsedCommand | null => {
  const text = content.trimEnd();
  if (!text.startsWith(prefix)) {
    return null;
  }

  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(text.slice(prefix.length));
  const name = match?.[1];
  if (!name) {
    return null;
  }

  return {
    name: name.toLowerCase(),
    argument: (match?.[2] ?? "").trim(),
  };
};

export const isPrefixCommand = (command: ParsedCommand): boolean =>
  command.name === PREFIX_COMMAND;
