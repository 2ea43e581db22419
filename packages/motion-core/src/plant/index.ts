export { createPointMass } from './point-mass.js';
export { createMassDamperSpring, isMassDamperSpring } from './mass-damper-spring.js';
export { semiImplicitEuler } from './integrate.js';
