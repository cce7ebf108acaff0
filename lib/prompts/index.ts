import { intentAnalysisPrompt } from './intentAnalysisPrompt';
import { scopeGuidancePrompt } from './scopeGuidancePrompt';
import { degradedAnswerPrompt } from './degradedAnswerPrompt';

export const prompts = {
  intentAnalysisPrompt,
  scopeGuidancePrompt,
  degradedAnswerPrompt
};
