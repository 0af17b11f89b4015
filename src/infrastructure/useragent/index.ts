export { WootheeClassifier, deviceCategoryOf } from './woothee-classifier.js';
