/**
 * Character Module
 */

export { ageBuffer, pushPresses, hasAction, consumeAction } from './input-buffer';
export type { TransitionContext, TransitionRule } from './transitions';
export { TRANSITIONS, inAttackRecovery } from './transitions';
export { applyDamage, applyHealing } from './health';
export type { StateChange, CharacterSystemOptions } from './system';
export { createCharacterSystem, stepCharacter, applyLocomotion, CHARACTER_PRIORITY } from './system';
