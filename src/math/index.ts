/**
 * Math Module
 */

export type { Vec2 } from './vec';
export {
    vec2Zero,
    vec2Clone,
    vec2Scale,
    vec2LengthSq,
    vec2Length,
    vec2Normalize,
    vec2Lerp,
    vec2Equals,
    vec2MaxAxisError
} from './vec';
