export { decideNutrientDosing } from './nutrient-dosing';
export * from './types';
