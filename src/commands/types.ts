/**
 * Countdown Bot — src/commands/types.ts
 * WHAT: Shape shared by every slash command module and the services they use.
 * WHY: Commands get their collaborators handed in by index.ts instead of importing
 *      singletons, so tests can build them against a temp store and a fake platform.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import type { CommandContext } from "../lib/cmdWrap.js";
import type { CountdownService } from "../features/countdown/service.js";
import type { Onboarding } from "../features/welcome.js";

export interface CommandDeps {
  service: CountdownService;
  onboarding: Onboarding;
  /** Bot owners; always treated as event managers */
  ownerIds: readonly string[];
}

export interface SlashCommand {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute(ctx: CommandContext, deps: CommandDeps): Promise<void>;
}
