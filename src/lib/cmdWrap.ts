/**
 * Countdown Bot — src/lib/cmdWrap.ts
 * WHAT: Interaction lifecycle helpers: tracing, step logging, structured error replies, safe replies.
 * WHY: Discord has a strict 3-second SLA for first responses; wrapping commands keeps
 *      acknowledgement and error handling identical across every command.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → error reply on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred (ephemeral by default)
 *  - replyOrEdit(): reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - Interaction replies: https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { SAFE_ALLOWED_MENTIONS } from "./constants.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "./errors.js";
import { logger } from "./logger.js";
import { ctx as reqCtx, newTraceId, runWithCtx } from "./reqctx.js";
import { addBreadcrumb, setContext, setTag } from "./sentry.js";

/** Label for where a command is in its execution: "it failed in 'persist'" beats a bare stack */
type Phase = string;

export type CommandContext<I extends ChatInputCommandInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

function errorCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

export function wrapCommand(name: string, fn: CommandExecutor) {
  return async (interaction: ChatInputCommandInteraction): Promise<void> => {
    const traceId = reqCtx().traceId ?? newTraceId();

    await runWithCtx(
      { traceId, cmd: name, kind: "slash", userId: interaction.user.id, guildId: interaction.guildId },
      async () => {
        const startedAt = Date.now();
        let phase: Phase = "enter";

        const commandCtx: CommandContext = {
          interaction,
          step: (newPhase: Phase) => {
            phase = newPhase;
            logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
            addBreadcrumb({ category: "cmd", message: name, data: { phase, traceId }, level: "info" });
          },
          currentPhase: () => phase,
          traceId,
        };

        logger.info(
          {
            evt: "cmd_start",
            traceId,
            cmd: name,
            sub: interaction.options.getSubcommand(false),
            userId: interaction.user.id,
            guildId: interaction.guildId ?? "dm",
          },
          "command start"
        );
        setTag("cmd", name);
        setTag("traceId", traceId);
        setContext("discord", {
          userId: interaction.user.id,
          guildId: interaction.guildId ?? "dm",
          channelId: interaction.channelId,
        });

        try {
          await fn(commandCtx);
          logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
        } catch (error) {
          const classified = classifyError(error);
          // Rejected input is the user's to fix, not ours; keep it out of error logs.
          // Error level is what reaches Sentry (logger hook), so noise goes out as warn.
          const level =
            classified.kind === "validation" ? "info" : shouldReportToSentry(classified) ? "error" : "warn";
          setContext("command", { cmd: name, phase, errorKind: classified.kind });
          logger[level](
            {
              evt: "cmd_error",
              traceId,
              cmd: name,
              phase,
              ...errorContext(classified),
              err: error instanceof Error ? error : new Error(String(error)),
            },
            `command error: ${classified.message}`
          );

          const suffix = classified.kind === "validation" ? "" : `\n-# Trace: \`${traceId}\``;
          try {
            await replyOrEdit(interaction, { content: `${userFriendlyMessage(classified)}${suffix}` });
          } catch (replyErr) {
            logger.error({ err: replyErr, traceId, evt: "cmd_error_reply_fail" }, "Failed to post error reply");
          }
        }
      }
    );
  };
}

/** Marks a phase and runs some work under it */
export async function withStep<T>(ctx: CommandContext, phase: Phase, fn: () => Promise<T> | T): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * First-time acknowledgement. 10062 (interaction expired) is logged and
 * swallowed; anything else is re-thrown.
 */
export async function ensureDeferred(interaction: ChatInputCommandInteraction): Promise<void> {
  if (interaction.deferred || interaction.replied) return;
  try {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
  } catch (err) {
    const code = errorCode(err);
    const payload = { evt: "cmd_defer_fail", traceId: reqCtx().traceId, code, err };
    if (code === 10062) {
      logger.warn(payload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(payload, "defer failed");
    throw err;
  }
}

/**
 * Replies with the right API for the interaction's state, avoiding 40060
 * (already acknowledged). Ephemeral and mention-free unless the payload says otherwise.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions
): Promise<void> {
  const withDefaults = {
    ...payload,
    flags: payload.flags ?? MessageFlags.Ephemeral,
    allowedMentions: payload.allowedMentions ?? SAFE_ALLOWED_MENTIONS,
  };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withDefaults;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withDefaults);
      return;
    }
    await interaction.reply(withDefaults);
  } catch (err) {
    const code = errorCode(err);
    const logPayload = { evt: "cmd_reply_fail", traceId: reqCtx().traceId, code, err };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
