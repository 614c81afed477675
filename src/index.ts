export * from './core/section';
export {
  DEFAULT_MATERIALS,
  createMaterial,
  findMaterial,
  formatModulus,
  validateMaterial,
} from './core/materials/Material';
export {
  SectionConsole,
  formatValue,
  type ConsoleEntry,
  type ConsoleLevel,
} from './core/console/ConsoleService';
