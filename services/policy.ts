import { Difficulty, ProviderFamily, type ModelOption, type PerformanceBand } from "../types";

export interface ReportBandRule {
  band: PerformanceBand;
  minAverage: number;
  assessment: string;
  recommendations: string[];
}

// ============================================================================
// INTERVIEW POLICY
// Every threshold the engine acts on lives here. Modules read from this
// object instead of carrying their own numbers.
// ============================================================================

export const INTERVIEW_POLICY = {
  RATING: {
    MIN: 1.0,
    MAX: 10.0,
    DECIMALS: 2,
  },

  DIFFICULTY: {
    LEVELS: [Difficulty.Easy, Difficulty.Medium, Difficulty.Hard],
    STEP_UP_ABOVE: 7.0,   // Strictly greater
    STEP_DOWN_BELOW: 4.0, // Strictly lower
  },

  MEMORY: {
    MAX_ENTRIES: 20,   // Two entries per turn
    EVICT_ENTRIES: 10, // Five complete turns
  },

  EVALUATION: {
    MAX_ATTEMPTS: 2,
    MISSING_POINTS_DEFAULT: 'N/A',
  },

  FALLBACK_SCORING: {
    DONT_KNOW_PHRASES: [
      'i dont know',
      "i don't know",
      'idk',
      'no idea',
      'dont know',
      "don't know",
      'not sure',
      'no clue',
    ],
    // Word-count bands, checked in order; the first band whose limit is not
    // reached wins.
    BANDS: [
      {
        belowWords: 3,
        rating: 1.5,
        strengths: 'Honest admission of not knowing',
        improvements: 'Study the topic and answer substantively',
      },
      {
        belowWords: 10,
        rating: 3.0,
        strengths: 'Brief attempt at answering',
        improvements: 'Needs more detail and concrete examples',
      },
      {
        belowWords: 30,
        rating: 5.0,
        strengths: 'Some relevant information provided',
        improvements: 'Expand on the concepts and add depth',
      },
    ],
    DETAILED: {
      rating: 6.0,
      strengths: 'Detailed response provided',
      improvements: 'Improve structure and clarity',
    },
    SENTINEL: 'Automated feedback could not be parsed; heuristic scoring applied',
  },

  RESUME: {
    MIN_TEXT_CHARS: 100,
    SUMMARY_MODEL: 'gemini-2.5-flash',
  },

  GENERATION: {
    TEMPERATURE: 0.7,
    MAX_OUTPUT_TOKENS: {
      [ProviderFamily.Gemini]: 2048,
      [ProviderFamily.OpenRouter]: 4096, // Small models truncate JSON below this
    },
  },

  REPORT: {
    // Checked top-down against the average rating.
    BANDS: [
      {
        band: 'EXCELLENT',
        minAverage: 8.0,
        assessment: 'Excellent - strong command of the subject with clear articulation',
        recommendations: [
          'Practice advanced scenarios and system design questions',
          'Prepare behavioral stories to complement technical strength',
          'Run mock interviews with practitioners from the target company',
        ],
      },
      {
        band: 'GOOD',
        minAverage: 6.0,
        assessment: 'Good - solid understanding with a few areas to polish',
        recommendations: [
          'Revisit the topics that received the lowest ratings',
          'Answer every part of a question before adding detail',
          'Use the STAR structure (Situation, Task, Action, Result) for scenario answers',
          'Schedule another mock interview in two to three weeks',
        ],
      },
      {
        band: 'FAIR',
        minAverage: 4.0,
        assessment: 'Fair - basic knowledge shown, focused development needed',
        recommendations: [
          'Rebuild the fundamentals of the target domain with a structured course',
          'Explain concepts out loud to improve articulation',
          'Work through practice problems daily, easy to intermediate',
          'Retake the mock interview after three to four weeks of preparation',
        ],
      },
      {
        band: 'NEEDS_IMPROVEMENT',
        minAverage: Number.NEGATIVE_INFINITY,
        assessment: 'Needs improvement - significant knowledge gaps identified',
        recommendations: [
          'Start from foundational concepts and build up gradually',
          'Split large topics into short daily study sessions',
          'Find a mentor or study group for regular feedback',
          'Hold off on real interviews until the basics feel comfortable',
          'Retake the mock interview after four to six weeks of study',
        ],
      },
    ] satisfies ReportBandRule[],
  },

  AUDIT: {
    MAX_LOG_LINES: 200,
  },

  MODELS: [
    { id: 'gemini-2.5-flash', name: 'Gemini 2.5 Flash (Recommended)', provider: ProviderFamily.Gemini },
    { id: 'gemini-2.5-flash-lite', name: 'Gemini 2.5 Flash-Lite (Faster)', provider: ProviderFamily.Gemini },
    { id: 'gemini-2.5-pro', name: 'Gemini 2.5 Pro (Best Quality)', provider: ProviderFamily.Gemini },
    { id: 'gemini-flash-latest', name: 'Gemini Flash Latest (Auto-update)', provider: ProviderFamily.Gemini },
    { id: 'microsoft/phi-3-mini-128k-instruct:free', name: 'Phi-3 Mini (Free)', provider: ProviderFamily.OpenRouter },
    { id: 'meta-llama/llama-3.2-3b-instruct:free', name: 'Llama 3.2 3B (Free)', provider: ProviderFamily.OpenRouter },
  ] satisfies ModelOption[],
};
