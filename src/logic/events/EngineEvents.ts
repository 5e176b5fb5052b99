import type { PerformanceLevel } from '../PerformanceController';
import type { JobId } from '@/types';

export enum EngineEvent {
  JobChanged = 'jobChanged',
  LevelChanged = 'levelChanged',
  CombatChanged = 'combatChanged',
  RestrictedAreaChanged = 'restrictedAreaChanged',
  DegradedChanged = 'degradedChanged',
  ConfigurationChanged = 'configurationChanged',
}

export interface EngineEventPayloads {
  [EngineEvent.JobChanged]: {
    previous: JobId;
    next: JobId;
    providerName: string | null;
  };
  [EngineEvent.LevelChanged]: {
    previous: number;
    next: number;
  };
  [EngineEvent.CombatChanged]: {
    inCombat: boolean;
  };
  [EngineEvent.RestrictedAreaChanged]: {
    inRestrictedArea: boolean;
  };
  [EngineEvent.DegradedChanged]: {
    level: PerformanceLevel;
  };
  [EngineEvent.ConfigurationChanged]: {
    version: number;
  };
}
