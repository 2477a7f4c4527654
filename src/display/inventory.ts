/**
 * display/inventory.ts
 *
 * Queries `xrandr --verbose` and parses the report into Output records.
 *
 * Report shape (abridged):
 *
 *   Screen 0: minimum 8 x 8, current 4480 x 1440, maximum 32767 x 32767
 *   eDP-1 connected primary 1920x1080+2560+360 (0x47) normal (normal left inverted right x axis y axis) 309mm x 174mm
 *   	Identifier: 0x42
 *   	EDID:
 *   		00ffffffffffff0006af3d...
 *   	...
 *     1920x1080 (0x47) 138.700MHz +HSync -VSync *current +preferred
 *   HDMI-1 disconnected (normal left inverted right x axis y axis)
 *
 * Output headers start in column 0, properties are tab-indented and the
 * EDID hex dump sits one level deeper than its "EDID:" label.
 */

import { AppConfig, Geometry, Output, Rotation } from '../core/types';
import { CommandRunner, describeFailure } from '../core/exec';
import { QueryError, ScreenswitchError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { classifyRole } from './roles';

const log = scopedLogger('display/inventory');

const SCREEN_RE = /^Screen \d+:/;
const HEADER_RE = /^(\S+) (connected|disconnected|unknown connection)( primary)?(?: (\d+)x(\d+)\+(-?\d+)\+(-?\d+))?(.*)$/;
const ROTATION_RE = /^ (?:\(0x[0-9a-f]+\) )?(normal|left|right|inverted) /;
const EDID_LABEL_RE = /^\s+EDID:\s*$/;
const HEX_LINE_RE = /^\s+([0-9a-fA-F]+)\s*$/;

/** Byte offsets of the four 18-byte display descriptors in an EDID base block. */
const EDID_DESCRIPTOR_OFFSETS = [54, 72, 90, 108];
const EDID_PRODUCT_NAME_TAG = 0xfc;

interface OutputDraft {
  name: string;
  connected: boolean;
  primary: boolean;
  geometry?: Geometry;
  rotation?: Rotation;
  edidHex: string;
}

/**
 * Extracts the monitor name from the display-product-name descriptor.
 * Returns undefined for truncated blocks or EDIDs without one.
 */
export function decodeEdidModel(hex: string): string | undefined {
  const bytes = Buffer.from(hex, 'hex');
  if (bytes.length < 128) return undefined;

  for (const offset of EDID_DESCRIPTOR_OFFSETS) {
    const isDisplayDescriptor = bytes[offset] === 0 && bytes[offset + 1] === 0 && bytes[offset + 2] === 0;
    if (!isDisplayDescriptor || bytes[offset + 3] !== EDID_PRODUCT_NAME_TAG) continue;

    const text = bytes.subarray(offset + 5, offset + 18).toString('latin1');
    const name = text.split('\n')[0].trim();
    if (name) return name;
  }
  return undefined;
}

function toOutput(draft: OutputDraft): Output {
  return {
    name: draft.name,
    role: classifyRole(draft.name),
    connected: draft.connected,
    primary: draft.primary,
    model: draft.edidHex ? decodeEdidModel(draft.edidHex) : undefined,
    geometry: draft.geometry,
    rotation: draft.rotation
  };
}

/**
 * Parses a full `xrandr --verbose` report. Every output is returned,
 * connected or not, in report order.
 */
export function parseVerboseReport(report: string): Output[] {
  const drafts: OutputDraft[] = [];
  let screens = 0;
  let current: OutputDraft | null = null;
  let inEdid = false;

  for (const line of report.split('\n')) {
    if (!line.trim()) continue;

    if (SCREEN_RE.test(line)) {
      screens++;
      current = null;
      inEdid = false;
      continue;
    }

    if (!/^\s/.test(line)) {
      const match = HEADER_RE.exec(line);
      if (!match) {
        throw new QueryError(`Unexpected line in xrandr report: ${line}`);
      }
      if (screens === 0) {
        throw new QueryError(`Output ${match[1]} reported outside of any screen`);
      }

      const [, name, state, primary, width, height, x, y, rest] = match;
      const rotation = ROTATION_RE.exec(rest);
      current = {
        name,
        connected: state === 'connected',
        primary: primary !== undefined,
        geometry: width !== undefined
          ? { width: Number(width), height: Number(height), x: Number(x), y: Number(y) }
          : undefined,
        rotation: width !== undefined && rotation ? parseRotation(rotation[1]) : undefined,
        edidHex: ''
      };
      drafts.push(current);
      inEdid = false;
      continue;
    }

    if (!current) continue;

    if (inEdid) {
      const hex = HEX_LINE_RE.exec(line);
      if (hex) {
        current.edidHex += hex[1];
        continue;
      }
      inEdid = false;
    }

    if (EDID_LABEL_RE.test(line)) {
      inEdid = true;
    }
  }

  // xrandr's "screen" is the X screen; we only know how to lay out one
  if (screens !== 1) {
    throw new QueryError(`Expected exactly one screen in xrandr report, found ${screens}`, { screens });
  }

  return drafts.map(toOutput);
}

function parseRotation(value: string): Rotation | undefined {
  switch (value) {
    case 'normal':
    case 'left':
    case 'right':
    case 'inverted':
      return value;
    default:
      return undefined;
  }
}

export class OutputInventory {
  constructor(
    private readonly runner: CommandRunner,
    private readonly config: Pick<AppConfig, 'commands' | 'timeouts'>
  ) {}

  /** Connected outputs in report order. Throws QueryError. */
  async listConnectedOutputs(): Promise<Output[]> {
    const command = this.config.commands.xrandr;

    let report: string;
    try {
      const result = await this.runner.run(command, ['--verbose'], { timeoutMs: this.config.timeouts.queryMs });
      if (result.exitCode !== 0) {
        throw new QueryError(`Error checking connected screens: ${describeFailure(result)}`, {
          exitCode: result.exitCode,
          stderr: result.stderr
        });
      }
      report = result.stdout;
    } catch (e) {
      if (e instanceof QueryError) throw e;
      if (e instanceof ScreenswitchError) {
        throw new QueryError(`Error checking connected screens: ${e.message}`, e.details);
      }
      throw e;
    }

    const connected = parseVerboseReport(report).filter(o => o.connected);
    log.debug({ outputs: connected.map(o => o.name), primary: connected.find(o => o.primary)?.name }, 'Connected outputs');
    return connected;
  }
}
