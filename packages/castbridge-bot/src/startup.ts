export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StartupError";
  }
}

const INVITE_PERMISSIONS = 36700160;

export function inviteUrl(clientId: string): string {
  return `https://discord.com/api/oauth2/authorize?client_id=${clientId}&permissions=${INVITE_PERMISSIONS}&scope=bot`;
}

export function resolveGuildId(cachedGuildIds: string[], configured?: string): string {
  if (configured !== undefined) {
    if (!cachedGuildIds.includes(configured)) {
      throw new StartupError(`Not a member of guild ${configured}`);
    }
    return configured;
  }

  const [first] = cachedGuildIds;
  if (first === undefined) {
    throw new StartupError("Not currently in any guilds");
  }
  return first;
}

// librespot splits the --onevent value on whitespace and has no quoting.
export function hookCommand(parts: string[]): string {
  const spaced = parts.find((part) => /\s/.test(part));
  if (spaced !== undefined) {
    throw new StartupError(
      `Cannot pass "${spaced}" to librespot --onevent because it contains whitespace; ` +
        "move the install to a path without spaces or set HOOK_COMMAND to a wrapper script",
    );
  }
  return parts.join(" ");
}
