import type { Command, CommandContext } from "./Command.js";

/**
 * Single entry point for session mutations: queues the command on its
 * session's lock and resolves with the command's result.
 */
export async function dispatchCommand<TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
): Promise<TResult> {
  return ctx.locks.runExclusive(command.sessionId, async () => {
    const started = Date.now();

    try {
      ctx.logger?.info?.(`[CMD] ${command.type}`, {
        sessionId: command.sessionId,
        at: command.at,
      });
      const result = await command.execute(ctx);
      ctx.logger?.info?.(`[CMD OK] ${command.type}`, {
        sessionId: command.sessionId,
        ms: Date.now() - started,
      });
      return result;
    } catch (error) {
      ctx.logger?.error?.(`[CMD ERR] ${command.type}`, {
        sessionId: command.sessionId,
        error,
      });
      throw error;
    }
  });
}
