/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */
import * as yup from 'yup'
import { UnwrapPromise } from './types'

export type YupSchema<Result = unknown, Context = yup.AnyObject> = yup.Schema<Result, Context>

export type YupSchemaResult<S extends YupSchema> = UnwrapPromise<
  ReturnType<S['validate']>
>

export type YupValidation<S extends YupSchema> =
  | { result: YupSchemaResult<S>; error: null }
  | { result: null; error: yup.ValidationError }

/**
 * Unknown keys are stripped unless the caller says otherwise
 */
function withDefaults(
  options?: yup.ValidateOptions<yup.AnyObject>,
): yup.ValidateOptions<yup.AnyObject> {
  return { ...options, stripUnknown: options?.stripUnknown ?? true }
}

export class YupUtils {
  static async tryValidate<S extends YupSchema>(
    schema: S,
    value: unknown,
    options?: yup.ValidateOptions<yup.AnyObject>,
  ): Promise<YupValidation<S>> {
    try {
      const result = (await schema.validate(value, withDefaults(options))) as YupSchemaResult<S>
      return { result, error: null }
    } catch (e) {
      if (e instanceof yup.ValidationError) {
        return { result: null, error: e }
      }
      throw e
    }
  }

  static tryValidateSync<S extends YupSchema>(
    schema: S,
    value: unknown,
    options?: yup.ValidateOptions<yup.AnyObject>,
  ): YupValidation<S> {
    try {
      const result = schema.validateSync(value, withDefaults(options)) as YupSchemaResult<S>
      return { result, error: null }
    } catch (e) {
      if (e instanceof yup.ValidationError) {
        return { result: null, error: e }
      }
      throw e
    }
  }
}
