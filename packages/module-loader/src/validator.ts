/**
 * Stepwise Module Loader - Descriptor Validator
 *
 * Validates the two fields every module descriptor must carry before the
 * factory looks up a variant: `type` and `interface`, both non-empty.
 *
 * Which type/interface combinations exist is not decided here; see
 * selectVariant() in factory.ts.
 */

import type { ModuleDescriptor, ValidationError, ValidationResult } from '@stepwise/kernel';
import { descriptorString } from './descriptor-values.js';

/** The descriptor fields that select a variant. */
export interface DescriptorShape {
  readonly typeString: string;
  readonly interfaceString: string;
}

export class ModuleValidator {
  /**
   * Check that `type` and `interface` are present and non-empty.
   *
   * @param descriptor - Raw descriptor mapping
   * @param instanceId - Used only as error context
   * @returns The two selection strings on success, one error per missing field otherwise
   */
  validateDescriptor(
    descriptor: ModuleDescriptor,
    instanceId: string,
  ): ValidationResult<DescriptorShape> {
    const typeString = descriptorString(descriptor['type']);
    const interfaceString = descriptorString(descriptor['interface']);
    const errors: ValidationError[] = [];

    if (typeString === '') {
      errors.push({ message: 'Missing or empty "type"', context: `instance: ${instanceId}` });
    }
    if (interfaceString === '') {
      errors.push({ message: 'Missing or empty "interface"', context: `instance: ${instanceId}` });
    }

    if (errors.length > 0) {
      return { ok: false, errors };
    }
    return { ok: true, value: { typeString, interfaceString } };
  }
}
