// src/index.ts

export * from './errors.js';
export * from './types/emulator-types.js';
export * from './constants/constants.js';
export { default as rootLogger, Logger } from './logger.js';

export { ProtocolDefinition } from './definition/protocol-definition.js';
export { ProtocolRegistry } from './definition/protocol-registry.js';
export { ProtocolLibrary, BUNDLED_DEFINITIONS_DIR } from './definition/protocol-library.js';
export { validateDefinitionSource } from './definition/definition-validator.js';

export { CommandMatcher } from './emulator/command-matcher.js';
export { DeviceStateStore } from './emulator/device-state-store.js';
export type { WriteResult, WriteAllResult, WriteRejection } from './emulator/device-state-store.js';
export { ResponseRenderer } from './emulator/response-renderer.js';
export { EmulationEngine } from './emulator/emulation-engine.js';

export { EmulatorServer } from './server/emulator-server.js';
export type { ServerSnapshot } from './server/emulator-server.js';
export { Session } from './server/session.js';
export { LineFramer } from './server/line-framer.js';
export { ActivityMonitor, isErrorResponse } from './server/activity-monitor.js';

export { normalizeModelKey } from './utils/utils.js';
export { suggestCommands } from './utils/suggest.js';
export { main } from './cli/main.js';
