export type ExperienceErrorCode =
  | "invalid_time_range"
  | "empty_meditation_type"
  | "empty_before_state"
  | "empty_after_state"
  | "empty_user_id";

export class ExperienceError extends Error {
  readonly code: ExperienceErrorCode;

  constructor(code: ExperienceErrorCode) {
    super(code);
    this.name = "ExperienceError";
    this.code = code;
  }
}
