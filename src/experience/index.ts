export { ExperienceEngine, type ExperienceEngineOptions } from './engine.js';
