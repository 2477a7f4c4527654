/**
 * Public surface for embedding screenswitch in other tooling.
 */

export * from './core/types';
export * from './core/errors';
export { loadConfig, defaultConfig, parseConfigFile, mergeConfig, markerPath } from './core/config';
export { initLogger, getLogger, scopedLogger } from './core/logger';
export { ChildProcessRunner } from './core/exec';
export type { CommandRunner, CommandResult, RunningCommand, StartOptions } from './core/exec';
export { OutputInventory, parseVerboseReport, decodeEdidModel } from './display/inventory';
export { KNOWN_OUTPUTS, INTERNAL_OUTPUT, classifyRole, prettyName, resolveKnownIdentity } from './display/roles';
export { PRESETS, findPreset, presetLabels } from './display/presets';
export {
  TopologyResolver,
  SELECTIONS,
  assignPresentation,
  internalOnlyBatch,
  homeBatch,
  presentationBatch,
  singleExternalBatch
} from './display/resolver';
export type { PresetChooser, PresentationAssignment } from './display/resolver';
export { CommandSynthesizer, toArguments } from './display/synthesizer';
export { relativePlacement, placementOf } from './display/geometry';
export { SessionCoordinator, PickerPresetChooser, interpretPickerExit } from './session/coordinator';
export { PidFileStore } from './session/store';
export type { SessionStore } from './session/store';
export { ProcfsProcessTable } from './session/process_table';
export type { ProcessTable, ProcessInfo } from './session/process_table';
export { DesktopSideEffects } from './effects/side_effects';
export { UdevadmEventSource, parseUeventLine } from './hotplug/event_source';
export type { HotplugEventSource } from './hotplug/event_source';
export { CycleWorker } from './hotplug/worker';
export type { CycleJob } from './hotplug/worker';
export { HotplugListener } from './hotplug/listener';
export { ApplyCycle, menuOptions } from './app/cycle';
export { buildApp } from './app/wiring';
