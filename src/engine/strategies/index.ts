export { first_strategy } from './first-strategy';
export { random_strategy } from './random-strategy';
export { greedy_intel_strategy } from './greedy-intel-strategy';
