import { z } from 'zod'
import { FLOW_UNIT_KEYS } from '../domain/types'
import { Result, ValidationError, ok, err } from '../domain/errors'

// Raw form text -> numbers. Physical limits (positive flow, wall vs diameter)
// are left to the engine so the same messages appear whatever the source.

function numberField(label: string) {
  return z.string()
    .trim()
    .min(1, `${label} is required`)
    .transform(Number)
    .pipe(z.number({ invalid_type_error: `${label} must be a number` }).finite(`${label} must be a finite number`))
}

export const calculatorFormSchema = z.object({
  flow: numberField('Flow rate'),
  flowUnit: z.enum(FLOW_UNIT_KEYS),
  outerDiameter: numberField('Outer diameter'),
  wallThickness: numberField('Wall thickness'),
})

export const calibrationFormSchema = calculatorFormSchema.extend({
  instrumentVelocity: numberField('Instrument velocity'),
})

export type CalculatorForm = z.input<typeof calculatorFormSchema>
export type CalculatorInput = z.output<typeof calculatorFormSchema>
export type CalibrationForm = z.input<typeof calibrationFormSchema>
export type CalibrationInput = z.output<typeof calibrationFormSchema>

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0]
  return {
    kind: 'ValidationError',
    code: 'InvalidInput',
    message: issue?.message ?? 'Invalid input',
    field: issue ? issue.path.join('.') : undefined,
  }
}

export function parseCalculatorForm(raw: CalculatorForm): Result<CalculatorInput, ValidationError> {
  const parsed = calculatorFormSchema.safeParse(raw)
  return parsed.success ? ok(parsed.data) : err(toValidationError(parsed.error))
}

export function parseCalibrationForm(raw: CalibrationForm): Result<CalibrationInput, ValidationError> {
  const parsed = calibrationFormSchema.safeParse(raw)
  return parsed.success ? ok(parsed.data) : err(toValidationError(parsed.error))
}
