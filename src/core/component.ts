/**
 * Component Types
 *
 * Components are pure data. The set of types is a compile-time enum and
 * `ComponentData` maps each member to its record, so the World's storage is
 * a type-indexed table rather than a bag of dynamic names.
 *
 * Archetype masks use one bit per type: `1 << type`.
 */

import {
    Transform,
    Hitbox,
    Character,
    Controller,
    cloneTransform,
    cloneHitbox,
    cloneCharacter,
    cloneController,
    transformEquals,
    hitboxEquals,
    characterEquals,
    controllerEquals
} from '../components';

export enum ComponentType {
    Transform = 0,
    Hitbox = 1,
    Character = 2,
    Controller = 3
}

export interface ComponentData {
    [ComponentType.Transform]: Transform;
    [ComponentType.Hitbox]: Hitbox;
    [ComponentType.Character]: Character;
    [ComponentType.Controller]: Controller;
}

/** Every component type in ascending order (the wire order too). */
export const COMPONENT_TYPES: readonly ComponentType[] = [
    ComponentType.Transform,
    ComponentType.Hitbox,
    ComponentType.Character,
    ComponentType.Controller
];

export const COMPONENT_COUNT = COMPONENT_TYPES.length;

/** Mask with every known component bit set. */
export const ALL_COMPONENTS_MASK = (1 << COMPONENT_COUNT) - 1;

/**
 * At most one record per type; absent keys mean the component is not attached.
 */
export type ComponentRecordSet = { [K in ComponentType]?: ComponentData[K] };

interface ComponentTraits<K extends ComponentType> {
    name: string;
    clone(data: ComponentData[K]): ComponentData[K];
    equals(a: ComponentData[K], b: ComponentData[K]): boolean;
}

const TRAITS: { [K in ComponentType]: ComponentTraits<K> } = {
    [ComponentType.Transform]: { name: 'Transform', clone: cloneTransform, equals: transformEquals },
    [ComponentType.Hitbox]: { name: 'Hitbox', clone: cloneHitbox, equals: hitboxEquals },
    [ComponentType.Character]: { name: 'Character', clone: cloneCharacter, equals: characterEquals },
    [ComponentType.Controller]: { name: 'Controller', clone: cloneController, equals: controllerEquals }
};

export function componentBit(type: ComponentType): number {
    return 1 << type;
}

export function maskOf(types: Iterable<ComponentType>): number {
    let mask = 0;
    for (const type of types) {
        mask |= componentBit(type);
    }
    return mask;
}

export function typesOfMask(mask: number): ComponentType[] {
    return COMPONENT_TYPES.filter(type => (mask & componentBit(type)) !== 0);
}

export function componentName(type: ComponentType): string {
    return TRAITS[type].name;
}

export function cloneComponent<K extends ComponentType>(type: K, data: ComponentData[K]): ComponentData[K] {
    const traits: ComponentTraits<K> = TRAITS[type];
    return traits.clone(data);
}

export function componentEquals<K extends ComponentType>(
    type: K,
    a: ComponentData[K],
    b: ComponentData[K]
): boolean {
    const traits: ComponentTraits<K> = TRAITS[type];
    return traits.equals(a, b);
}

/**
 * Copy one entry of a record set into another, cloning the data.
 */
export function copyRecord<K extends ComponentType>(
    type: K,
    from: ComponentRecordSet,
    to: ComponentRecordSet
): void {
    const data: ComponentData[K] | undefined = from[type];
    if (data !== undefined) {
        setRecord(to, type, cloneComponent(type, data));
    }
}

export function getRecord<K extends ComponentType>(set: ComponentRecordSet, type: K): ComponentData[K] | undefined {
    return set[type];
}

export function setRecord<K extends ComponentType>(set: ComponentRecordSet, type: K, data: ComponentData[K]): void {
    set[type] = data;
}

