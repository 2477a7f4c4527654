/**
 * display/synthesizer.ts
 *
 * Renders a LayoutBatch into xrandr's flag grammar and applies it in a
 * single invocation, so xrandr accepts or rejects the batch as a whole.
 */

import { AppConfig, Directive, LayoutBatch, Relation } from '../core/types';
import { CommandRunner, describeFailure, formatCommand } from '../core/exec';
import { ApplyError, ScreenswitchError } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('display/synthesizer');

const RELATION_FLAGS: Record<Relation, string> = {
  'left-of':  '--left-of',
  'above':    '--above',
  'right-of': '--right-of',
  'same-as':  '--same-as'
};

export interface ApplyResult {
  invoked: boolean;                        // false for an empty batch
  warning?: string;                        // stderr of a successful run
}

export function directiveFlags(directive: Directive): string[] {
  switch (directive.kind) {
    case 'relation': return [RELATION_FLAGS[directive.relation], directive.reference];
    case 'auto':     return ['--auto'];
    case 'mode':     return ['--mode', directive.resolution];
    case 'off':      return ['--off'];
    case 'rotate':   return ['--rotate', directive.rotation];
  }
}

/** `--output <id> <flags...>` per operation, in batch order. */
export function toArguments(batch: LayoutBatch): string[] {
  return batch.flatMap(op => ['--output', op.output, ...op.directives.flatMap(directiveFlags)]);
}

export class CommandSynthesizer {
  constructor(
    private readonly runner: CommandRunner,
    private readonly config: Pick<AppConfig, 'commands' | 'timeouts'>
  ) {}

  /**
   * Throws ApplyError when xrandr exits non-zero, cannot be spawned,
   * or times out.
   */
  async apply(batch: LayoutBatch): Promise<ApplyResult> {
    if (batch.length === 0) {
      log.info('Empty batch, nothing to apply');
      return { invoked: false };
    }

    const command = this.config.commands.xrandr;
    const args = toArguments(batch);
    log.info({ command: formatCommand(command, args) }, 'Applying layout');

    try {
      const result = await this.runner.run(command, args, { timeoutMs: this.config.timeouts.applyMs });
      if (result.exitCode !== 0) {
        throw new ApplyError(`Error running xrandr: ${describeFailure(result)}`, {
          args,
          exitCode: result.exitCode,
          stderr: result.stderr
        });
      }

      const warning = result.stderr.trim();
      if (warning) {
        log.warn({ warning }, 'xrandr succeeded with diagnostics');
        return { invoked: true, warning };
      }
      return { invoked: true };
    } catch (e) {
      if (e instanceof ApplyError) throw e;
      if (e instanceof ScreenswitchError) {
        throw new ApplyError(`Error running xrandr: ${e.message}`, { args, ...e.details });
      }
      throw e;
    }
  }
}
