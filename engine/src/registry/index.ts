export * from './UnitRegistry.js';
