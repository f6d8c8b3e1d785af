export * from './half-lives.js';
export { DecayCalculator, type DecaySettings } from './calculator.js';
