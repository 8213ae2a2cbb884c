// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Tab catalog: system prompts, quick questions and the fixed task prompts
 * for the job-match and code-explainer tabs.
 */

export type TabId = 'studyNotes' | 'jobMatch' | 'codeExplainer' | 'recipe' | 'caseStudy' | 'general';

export const TAB_NAMES: Record<TabId, string> = {
  studyNotes: 'Study Notes Question And Answer',
  jobMatch: 'Basic Job Match Assistant',
  codeExplainer: 'Simple Code Explainer',
  recipe: 'Recipe Recommendation',
  caseStudy: 'Virtual Case Study Creator',
  general: 'General Chat',
};

export const TAB_SYSTEM_PROMPTS: Record<TabId, string> = {
  studyNotes: 'You help students with Q&A based on study notes. Keep answers concise and structured.',
  jobMatch: 'You assist with matching candidate skills to job descriptions and suggest improvements.',
  codeExplainer: 'You explain code in simple terms with step-by-step reasoning and examples.',
  recipe: 'You are a helpful chef assistant. Ask clarifying questions and suggest recipes.',
  caseStudy: 'You create realistic case studies with constraints and questions for analysis.',
  general: 'You are a helpful assistant. Answer clearly and say so when you are unsure.',
};

/** Tabs usable with the free-form chat operation */
export const CHAT_TOPICS = ['general', 'recipe', 'caseStudy'] as const;
export type ChatTopic = (typeof CHAT_TOPICS)[number];

export function isChatTopic(value: string): value is ChatTopic {
  return CHAT_TOPICS.some((topic) => topic === value);
}

export const JOB_MATCH_TASK =
  'Please analyze the following job description and candidate profile. Provide: ' +
  '1) Match score (0-100) 2) Key matching skills 3) Gaps and suggestions 4) A brief tailored summary.';

export const CODE_EXPLAIN_TASK =
  'Explain what the following code does, step by step, then point out anything surprising or error-prone.';

// ============================================
// Quick questions
// ============================================

export interface QuickQuestion {
  id: string;
  category: 'summary' | 'studyTools' | 'analysis';
  label: string;
  prompt: string;
}

export const QUICK_QUESTIONS: readonly QuickQuestion[] = [
  { id: 'summary', category: 'summary', label: 'Summarize', prompt: 'Summarize the main points from my study notes.' },
  { id: 'takeaways', category: 'summary', label: 'Key takeaways', prompt: 'What are the most important takeaways from my study notes?' },
  { id: 'overview', category: 'summary', label: 'Overview', prompt: 'Give me a comprehensive overview of my study notes.' },
  { id: 'flashcards', category: 'studyTools', label: 'Flashcards', prompt: 'Create flashcards from the key concepts in my notes.' },
  { id: 'practice', category: 'studyTools', label: 'Practice questions', prompt: 'Generate practice questions based on my study notes.' },
  { id: 'quiz', category: 'studyTools', label: 'Quiz', prompt: 'Create a quiz to test my understanding of these notes.' },
  { id: 'explain-simply', category: 'analysis', label: 'Explain simply', prompt: 'Explain the key concepts from my study notes in simple terms.' },
  { id: 'connections', category: 'analysis', label: 'Connections', prompt: 'What are the connections between different concepts in my notes?' },
  { id: 'clarify', category: 'analysis', label: 'Clarify', prompt: 'Help me clarify any confusing topics from my notes.' },
];

/**
 * Look up a quick question by id.
 */
export function getQuickQuestion(id: string): QuickQuestion | undefined {
  return QUICK_QUESTIONS.find((question) => question.id === id);
}
