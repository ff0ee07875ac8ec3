/**
 * Prompt construction for answers, personalization and translation
 */

import type { UserProfileRecord } from '@/db/schema';

export type PromptProfile = Pick<
  UserProfileRecord,
  'softwareBackground' | 'hardwareBackground' | 'operatingSystem' | 'experienceLevel'
>;

export const URDU_INSTRUCTION = 'Please respond in Urdu (اردو) with proper RTL formatting.';

export const NO_ANSWER_REPLY = "I don't have enough information in the textbook to answer that.";

/** Empty for English */
export function languageInstruction(language: string): string {
  if (language === 'en') return '';
  if (language === 'ur') return URDU_INSTRUCTION;
  return `Please respond in the language with code "${language}".`;
}

function describeProfile(profile: PromptProfile): string {
  return [
    `- Software Background: ${profile.softwareBackground ?? 'Unknown'}`,
    `- Hardware Background: ${profile.hardwareBackground ?? 'Unknown'}`,
    `- Experience Level: ${profile.experienceLevel}`,
    `- OS: ${profile.operatingSystem ?? 'Unknown'}`,
  ].join('\n');
}

export interface AnswerPromptInput {
  subject: string;
  question: string;
  context: string[];
  profile: PromptProfile | null;
  selectedText?: string | null;
  language: string;
}

export function buildAnswerPrompt(input: AnswerPromptInput): string {
  const sections = [`You are an AI assistant for a ${input.subject}.`];

  if (input.profile) {
    sections.push(
      `User Profile:\n${describeProfile(input.profile)}\n\nAdapt your answer to match the user's background and experience level.`
    );
  }

  sections.push(
    `Context from the textbook:\n${input.context.length > 0 ? input.context.join('\n\n') : '(no matching passages)'}`
  );

  if (input.selectedText) {
    sections.push(`Text the user selected:\n${input.selectedText}`);
  }

  const instruction = languageInstruction(input.language);
  if (instruction) {
    sections.push(instruction);
  }

  sections.push(`User Question: ${input.question}`);
  sections.push(
    [
      'Instructions:',
      '1. Answer ONLY based on the provided context from the textbook',
      `2. If the context doesn't contain the answer, say "${NO_ANSWER_REPLY}"`,
      '3. Be concise but thorough',
      '4. Use examples from the context when relevant',
      '5. If personalization info is provided, adapt your explanation to the user\'s level',
    ].join('\n')
  );
  sections.push('Answer:');

  return sections.join('\n\n');
}

export function buildPersonalizePrompt(content: string, profile: PromptProfile): string {
  return [
    `Adapt the following educational content for a user with this profile:\n${describeProfile(profile)}`,
    `Original Content:\n${content}`,
    [
      'Instructions:',
      '1. Adjust complexity to match experience level',
      '2. Add relevant examples based on their background',
      '3. Use analogies they would understand',
      '4. Keep the same structure and key concepts',
    ].join('\n'),
    'Personalized Content:',
  ].join('\n\n');
}

export function buildTranslatePrompt(content: string, targetLanguage: string): string {
  const target =
    targetLanguage === 'ur' ? 'Urdu (اردو)' : `the language with code "${targetLanguage}"`;
  const rtl = targetLanguage === 'ur' ? '\nUse proper RTL formatting.' : '';

  return [
    `Translate the following text to ${target}.\nMaintain technical terms in English if they don't have common equivalents.${rtl}`,
    `Text to translate:\n${content}`,
    'Translation:',
  ].join('\n\n');
}
