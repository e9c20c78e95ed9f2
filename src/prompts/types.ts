/**
 * Types for model prompts
 */

export interface PromptArgument {
  name: string;
  description: string;
  required: boolean;
}

export interface PromptDefinition {
  name: string;
  description: string;
  arguments: PromptArgument[];
  /** Template text with `{{argument}}` placeholders */
  template: string;
}
