import { describe, it, expect } from 'vitest';
import {
  NO_ANSWER_REPLY,
  URDU_INSTRUCTION,
  buildAnswerPrompt,
  buildPersonalizePrompt,
  buildTranslatePrompt,
  languageInstruction,
} from '@/services/assistant/prompts';

const profile = {
  softwareBackground: 'JavaScript',
  hardwareBackground: null,
  operatingSystem: 'Ubuntu 22.04',
  experienceLevel: 'beginner',
};

const base = {
  subject: 'Physical AI & Humanoid Robotics textbook',
  question: 'What is a ROS 2 node?',
  context: ['A node is a process.', 'Nodes communicate over topics.'],
  profile: null,
  language: 'en',
};

describe('languageInstruction', () => {
  it('asks for Urdu with RTL formatting', () => {
    expect(languageInstruction('ur')).toBe(
      'Please respond in Urdu (اردو) with proper RTL formatting.'
    );
  });

  it('is empty for English and names other codes', () => {
    expect(languageInstruction('en')).toBe('');
    expect(languageInstruction('fr')).toBe('Please respond in the language with code "fr".');
  });
});

describe('buildAnswerPrompt', () => {
  it('includes subject, context, question and the fallback reply', () => {
    const prompt = buildAnswerPrompt(base);

    expect(prompt.startsWith('You are an AI assistant for a Physical AI & Humanoid Robotics textbook.')).toBe(true);
    expect(prompt).toContain('Context from the textbook:\nA node is a process.\n\nNodes communicate over topics.');
    expect(prompt).toContain('User Question: What is a ROS 2 node?');
    expect(prompt).toContain(NO_ANSWER_REPLY);
    expect(prompt.endsWith('Answer:')).toBe(true);
    expect(prompt).not.toContain('User Profile:');
    expect(prompt).not.toContain(URDU_INSTRUCTION);
  });

  it('marks an empty context', () => {
    expect(buildAnswerPrompt({ ...base, context: [] })).toContain(
      'Context from the textbook:\n(no matching passages)'
    );
  });

  it('adds the profile, selected text and language instruction', () => {
    const prompt = buildAnswerPrompt({
      ...base,
      profile,
      selectedText: 'rclpy.spin(node)',
      language: 'ur',
    });

    expect(prompt).toContain(
      'User Profile:\n- Software Background: JavaScript\n- Hardware Background: Unknown\n- Experience Level: beginner\n- OS: Ubuntu 22.04'
    );
    expect(prompt).toContain('Text the user selected:\nrclpy.spin(node)');
    expect(prompt).toContain(URDU_INSTRUCTION);
  });
});

describe('buildPersonalizePrompt', () => {
  it('describes the profile and embeds the content', () => {
    const prompt = buildPersonalizePrompt('Sensors measure the world.', profile);

    expect(prompt).toContain('- Experience Level: beginner');
    expect(prompt).toContain('Original Content:\nSensors measure the world.');
    expect(prompt.endsWith('Personalized Content:')).toBe(true);
  });
});

describe('buildTranslatePrompt', () => {
  it('targets Urdu with RTL formatting', () => {
    const prompt = buildTranslatePrompt('Hello robot', 'ur');

    expect(prompt.startsWith('Translate the following text to Urdu (اردو).')).toBe(true);
    expect(prompt).toContain('Use proper RTL formatting.');
    expect(prompt).toContain('Text to translate:\nHello robot');
  });

  it('names other language codes', () => {
    const prompt = buildTranslatePrompt('Hello robot', 'de');

    expect(prompt.startsWith('Translate the following text to the language with code "de".')).toBe(true);
    expect(prompt).not.toContain('RTL');
  });
});
