export interface Option {
  id: number;
  body: string;
  correct: boolean;
}

export interface Question {
  id: number;
  body: string;
  options: Option[];
}

export interface AddOption {
  body: string;
  correct: boolean;
}

export interface AddQuestion {
  body: string;
  options: AddOption[];
}

/**
 * Shape accepted by updates and deletes. Options carry the id they were read
 * with; an option without one is new and has nothing to delete.
 */
export interface QuestionInput {
  id: number;
  body: string;
  options: Array<AddOption & { id?: number }>;
}

/* ------------------------------ row shapes ------------------------------ */

export interface OptionRow {
  id: number;
  body: string;
  correct: number;
}

export interface QuestionBodyRow {
  id: number;
  body: string;
}

export interface LinkRow {
  question_id: number;
  option_id: number;
  option_order: number;
}
