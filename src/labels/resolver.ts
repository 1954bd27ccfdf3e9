import {
  COMPONENT_LABEL,
  USER_COMPONENT_LABEL,
  type Labels,
} from '../types';

/**
 * Build the label set for one observation.
 *
 * Global labels come first and job labels overlay them, so a job value wins
 * on collision. A user-supplied `component` key is moved to
 * `user_defined_component` before the runtime `component` is set.
 *
 * @example
 * ```typescript
 * resolveLabels({ dc: 'X', env: 'prod' }, { dc: 'Y', component: 'db' }, 'main')
 * // { dc: 'Y', env: 'prod', user_defined_component: 'db', component: 'main' }
 * ```
 */
export function resolveLabels(
  globalLabels: Readonly<Labels>,
  jobLabels: Readonly<Labels>,
  component: string
): Labels {
  const merged: Labels = { ...globalLabels, ...jobLabels };

  if (Object.prototype.hasOwnProperty.call(merged, COMPONENT_LABEL)) {
    const userComponent = merged[COMPONENT_LABEL];
    delete merged[COMPONENT_LABEL];
    merged[USER_COMPONENT_LABEL] = userComponent;
  }

  merged[COMPONENT_LABEL] = component;
  return merged;
}

/**
 * Whether a user label mapping uses the reserved `component` key.
 */
export function hasReservedLabel(labels: Readonly<Labels>): boolean {
  return Object.prototype.hasOwnProperty.call(labels, COMPONENT_LABEL);
}
