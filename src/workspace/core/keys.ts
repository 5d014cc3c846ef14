/**
 * Requirements addressed:
 * - Builder keys use `|` and target keys use `:` as the package separator.
 * - A definition is always qualified by the defining package.
 * - A bare usage refers to the builder or target named after another package
 *   (`angular` =\> `angular|angular`); a leading separator refers to the using
 *   package.
 */

const normalizeDefinition = (
  name: string,
  packageName: string,
  separator: string,
): string => {
  if (name.startsWith(separator)) return `${packageName}${name}`;
  if (!name.includes(separator)) return `${packageName}${separator}${name}`;
  return name;
};

const normalizeUsage = (
  name: string,
  packageName: string,
  separator: string,
): string => {
  if (name.startsWith(separator)) return `${packageName}${name}`;
  if (!name.includes(separator)) return `${name}${separator}${name}`;
  return name;
};

export const normalizeBuilderKeyDefinition = (
  builderKey: string,
  packageName: string,
): string => normalizeDefinition(builderKey, packageName, '|');

export const normalizeBuilderKeyUsage = (
  builderKey: string,
  packageName: string,
): string => normalizeUsage(builderKey, packageName, '|');

export const normalizeTargetKeyDefinition = (
  targetKey: string,
  packageName: string,
): string => normalizeDefinition(targetKey, packageName, ':');

export const normalizeTargetKeyUsage = (
  targetKey: string,
  packageName: string,
): string => normalizeUsage(targetKey, packageName, ':');
