/**
 * @addon-lint/sarif
 *
 * SARIF v2.1.0 output generation for the addon linter.
 *
 * SARIF (Static Analysis Results Interchange Format) is the standard
 * format for static analysis tools, natively supported by GitHub.
 */

export { generateSarif, type SarifOptions } from './generator.js';
