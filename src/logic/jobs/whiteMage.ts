import { z } from 'zod';
import whiteMageJson from '@/content/jobs/whiteMage.json';
import { ConfigurationError } from '@/core/errors';
import type { AuxiliaryRule } from '../rules/AuxiliarySuggestionEngine';
import type { PriorityRule, RuleChainDefinition } from '../rules/RuleChain';
import type { RuleContext } from '../rules/RuleContext';
import type { TargetingRule } from '../selection/TargetingRules';
import type { JobProvider } from './JobProvider';
import { SENTINEL, type ActionId } from '@/types';

const TierSchema = z.array(z.object({ level: z.number().int().min(1), actionId: z.number().int().positive() }));

const WhiteMageDataSchema = z.object({
  jobId: z.number().int().positive(),
  name: z.string().min(1),
  tiers: z.object({
    singleTarget: TierSchema.min(1),
    damageOverTime: TierSchema,
    areaOfEffect: TierSchema,
  }),
  damageOverTimeDebuffs: z.array(z.object({ actionId: z.number().int(), debuffId: z.number().int() })),
  actions: z.object({
    glare4: z.number().int(),
    afflatusMisery: z.number().int(),
    afflatusSolace: z.number().int(),
    afflatusRapture: z.number().int(),
    presenceOfMind: z.number().int(),
    lucidDreaming: z.number().int(),
    assize: z.number().int(),
    cure: z.number().int(),
    cure2: z.number().int(),
    cure3: z.number().int(),
    regen: z.number().int(),
    tetragrammaton: z.number().int(),
    divineBenison: z.number().int(),
    asylum: z.number().int(),
    aquaveil: z.number().int(),
    liturgyOfTheBell: z.number().int(),
    liturgyOfTheBellBurst: z.number().int(),
    esuna: z.number().int(),
  }),
  buffs: z.object({
    presenceOfMind: z.number().int(),
    sacredSight: z.number().int(),
    liturgyOfTheBell: z.number().int(),
  }),
  refreshWindowSeconds: z.number().nonnegative(),
  lucidDreamingResourceCeiling: z.number().nonnegative(),
  lilyOvercapTimerMs: z.number().nonnegative(),
});

export type WhiteMageData = z.infer<typeof WhiteMageDataSchema>;
type Tier = WhiteMageData['tiers']['singleTarget'];

let cachedData: WhiteMageData | null = null;

export function whiteMageData(): WhiteMageData {
  if (cachedData) {
    return cachedData;
  }
  const result = WhiteMageDataSchema.safeParse(whiteMageJson);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid white mage data',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  cachedData = result.data;
  return cachedData;
}

/** Highest tier unlocked at `level`, or 0 when none is. */
export function actionForLevel(tier: Tier, level: number): ActionId {
  for (let i = tier.length - 1; i >= 0; i -= 1) {
    if (level >= tier[i].level) {
      return tier[i].actionId;
    }
  }
  return 0;
}

export interface LilyGauge {
  healingLilies: number;
  bloodLilies: number;
  lilyTimerMs: number;
}

export function decodeLilyGauge(word1: number, word2: number): LilyGauge {
  return {
    healingLilies: word1 & 0xff,
    bloodLilies: (word1 >>> 8) & 0xff,
    lilyTimerMs: word2 >>> 0,
  };
}

export function createWhiteMageProvider(data: WhiteMageData = whiteMageData()): JobProvider {
  const { actions, buffs, tiers } = data;
  const debuffByAction = new Map<ActionId, number>(
    data.damageOverTimeDebuffs.map((entry): [ActionId, number] => [entry.actionId, entry.debuffId]),
  );

  const gauge = (context: RuleContext) =>
    decodeLilyGauge(context.snapshot.gaugeWord1, context.snapshot.gaugeWord2);
  const singleTarget = (context: RuleContext) => actionForLevel(tiers.singleTarget, context.snapshot.level);
  const damageOverTime = (context: RuleContext) => actionForLevel(tiers.damageOverTime, context.snapshot.level);
  const areaOfEffect = (context: RuleContext) => actionForLevel(tiers.areaOfEffect, context.snapshot.level);

  const hasOvercapRisk = (context: RuleContext) => {
    const { healingLilies, lilyTimerMs } = gauge(context);
    return healingLilies >= 3 || (healingLilies >= 2 && lilyTimerMs >= data.lilyOvercapTimerMs);
  };
  const bloodLilyReady = (context: RuleContext) => gauge(context).bloodLilies >= 3;

  const needsRefresh = (context: RuleContext) => {
    const debuffId = debuffByAction.get(damageOverTime(context));
    if (debuffId === undefined) {
      return false;
    }
    const remaining = context.debuffRemaining(debuffId);
    return remaining === SENTINEL || remaining <= data.refreshWindowSeconds;
  };

  const sharedRules: PriorityRule[] = [
    { label: 'Afflatus Rapture on lily overcap', condition: hasOvercapRisk, resolve: actions.afflatusRapture },
    { label: 'Afflatus Misery when blood lily is full', condition: bloodLilyReady, resolve: actions.afflatusMisery },
    {
      label: 'Glare IV under Sacred Sight',
      condition: (context) => context.hasBuff(buffs.sacredSight),
      resolve: actions.glare4,
    },
  ];

  const chains: RuleChainDefinition[] = [
    {
      name: 'Single Target',
      triggers: tiers.singleTarget.map((entry) => entry.actionId),
      rules: [
        ...sharedRules,
        {
          label: 'Damage over time while moving',
          condition: (context) => context.isMoving(),
          resolve: (context) => damageOverTime(context),
        },
        { label: 'Apply or refresh damage over time', condition: needsRefresh, resolve: (context) => damageOverTime(context) },
        { label: 'Single target filler', condition: () => true, resolve: (context) => singleTarget(context), fallback: true },
      ],
    },
    {
      name: 'Area of Effect',
      triggers: tiers.areaOfEffect.map((entry) => entry.actionId),
      rules: [
        ...sharedRules,
        { label: 'Area filler', condition: () => true, resolve: (context) => areaOfEffect(context), fallback: true },
      ],
    },
  ];

  const auxiliaryRules: AuxiliaryRule[] = [
    {
      label: 'Assize',
      priority: 1,
      condition: (context) => context.isAuxiliaryReady(actions.assize),
      actionId: actions.assize,
    },
    {
      label: 'Presence of Mind',
      priority: 2,
      condition: (context) => !context.hasBuff(buffs.presenceOfMind) && context.isAuxiliaryReady(actions.presenceOfMind),
      actionId: actions.presenceOfMind,
    },
    {
      label: 'Lucid Dreaming',
      priority: 3,
      condition: (context) =>
        context.snapshot.resourceCurrent <= data.lucidDreamingResourceCeiling &&
        context.isAuxiliaryReady(actions.lucidDreaming),
      actionId: actions.lucidDreaming,
    },
  ];

  const targetingRules: TargetingRule[] = [
    { actionId: actions.cure, mode: 'smart', displayName: 'Cure' },
    { actionId: actions.cure2, mode: 'smart', displayName: 'Cure II' },
    { actionId: actions.cure3, mode: 'smart', displayName: 'Cure III' },
    { actionId: actions.regen, mode: 'smart', displayName: 'Regen' },
    { actionId: actions.afflatusSolace, mode: 'smart', displayName: 'Afflatus Solace' },
    { actionId: actions.tetragrammaton, mode: 'smart', displayName: 'Tetragrammaton' },
    { actionId: actions.divineBenison, mode: 'smart', displayName: 'Divine Benison' },
    { actionId: actions.asylum, mode: 'ground', displayName: 'Asylum' },
    { actionId: actions.aquaveil, mode: 'smart', displayName: 'Aquaveil' },
    {
      actionId: actions.liturgyOfTheBell,
      mode: 'groundSpecial',
      displayName: 'Liturgy of the Bell',
      secondaryActionId: actions.liturgyOfTheBellBurst,
      requiredBuffId: buffs.liturgyOfTheBell,
    },
    { actionId: actions.esuna, mode: 'cleanse', displayName: 'Esuna' },
  ];

  return {
    jobId: data.jobId,
    name: data.name,
    chains,
    auxiliaryRules,
    targetingRules,
    tracking: {
      actorBuffs: [buffs.presenceOfMind, buffs.sacredSight, buffs.liturgyOfTheBell],
      targetDebuffs: data.damageOverTimeDebuffs.map((entry) => entry.debuffId),
      actionCooldowns: [actions.lucidDreaming, actions.presenceOfMind, actions.assize, actions.afflatusRapture],
    },
    describe: (context) => {
      const { healingLilies, bloodLilies, lilyTimerMs } = gauge(context);
      return `${data.name} | lilies ${healingLilies}/3 (${lilyTimerMs}ms) | blood ${bloodLilies}/3`;
    },
  };
}
