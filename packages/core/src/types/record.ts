/**
 * Record types exchanged between the cleaning stage and the engine
 */

/** Scalar value of a cleaned field */
export type FieldValue = string | number | boolean | null;

/** A cleaned row of data, field name to scalar value */
export type Fields = {
  [field: string]: FieldValue;
};

/** Cleaned record as handed to the engine */
export interface InputRecord {
  /** Input row index, used to restore order after concurrent processing */
  readonly recordId: number;
  /** Field values, frozen once read from the cleaning stage */
  readonly fields: Readonly<Fields>;
}
