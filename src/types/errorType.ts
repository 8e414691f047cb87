/** One field-level problem reported with a ValidationError. */
export type validationErrorType = {
  field: string;
  message: string;
};
