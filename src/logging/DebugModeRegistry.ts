/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset for testing.
 *
 * Components register themselves at load time (e.g. "tree-assembler", "sync-engine"),
 * so an operator can turn on DEBUG output for one pipeline stage without the rest.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

interface ComponentRegistration {
  name: string;
  description: string;
  levelOverride?: LogLevel;
}

const registry = new Map<string, ComponentRegistration>();

export function registerComponent(name: string, description: string, defaultLevel?: LogLevel): void {
  const existing = registry.get(name);
  registry.set(name, {
    name,
    description,
    levelOverride: defaultLevel ?? existing?.levelOverride,
  });
}

/**
 * Registered components with their descriptions, sorted by name.
 */
export function getRegisteredComponents(): Array<{ name: string; description: string }> {
  return [...registry.values()]
    .map(({ name, description }) => ({ name, description }))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function setComponentLevel(name: string, level: LogLevel): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = level;
  } else {
    registry.set(name, { name, description: name, levelOverride: level });
  }
}

export function clearComponentLevel(name: string): void {
  const existing = registry.get(name);
  if (existing) {
    existing.levelOverride = undefined;
  }
}

/**
 * The component's override if set, otherwise the global level.
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  return registry.get(name)?.levelOverride ?? globalLevel;
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply entries like ["tree-assembler", "sync-engine:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

export function resetDebugRegistry(): void {
  registry.clear();
}
