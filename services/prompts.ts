import { Language, ProviderFamily, type PromptStage } from "../types";

// Placeholders use {name}. JSON examples inside a template start with "{" and
// a newline, so they never collide with a placeholder.

const RESUME_SUMMARY = `You are an experienced resume reviewer. Read the resume text below and write a structured summary of about 150 words.

Cover:
1. Professional background and years of experience
2. Core technical skills and areas of expertise
3. Notable projects or achievements
4. Education
5. Domain specialization

Resume Text:
{resume_text}

Write a professional summary of the candidate's core competencies.`;

const QUESTION_EN = `You are a senior technical interviewer running a {difficulty} interview for a {role} position.

Resume Summary:
{resume_summary}

Current Difficulty Level: {difficulty}
Last Answer Rating: {last_rating}/10

Conversation So Far:
{history}

Task: ask ONE new interview question.
- Base it on the candidate's resume and the role.
- Easy: fundamentals and definitions.
- Medium: practical application and problem solving.
- Hard: complex scenarios, system design or advanced internals.
- Do not repeat earlier topics. Keep it to at most two sentences.

Tone:
- Sound like a person, not a form.
- If the last rating is 7.0 or higher, open with brief praise ("Nice explanation."). Otherwise, or when it is N/A, use a neutral transition ("Moving on.").
- Never say "Here is your question" or "Based on your resume", and never mention the difficulty level or a score.

Next question:`;

const QUESTION_HI = `Aap ek senior technical interviewer hain jo {role} position ke liye {difficulty} level ka interview le rahe hain.

Resume Summary:
{resume_summary}

Current Difficulty Level: {difficulty}
Last Answer Rating: {last_rating}/10

Ab tak ki baatcheet:
{history}

Task: ek naya interview question puchiye.
- Question resume aur role par based ho.
- Easy: basics aur definitions.
- Medium: practical application aur problem solving.
- Hard: complex scenarios, system design ya advanced internals.
- Pichle topics repeat mat kijiye. Zyada se zyada do sentences.

Tone:
- Naturally baat kijiye, robot ki tarah nahi.
- Agar last rating 7.0 ya usse zyada hai, chhoti si tareef se shuru kijiye ("Bahut badhiya!"). Warna, ya N/A hone par, neutral transition use kijiye ("Chaliye aage badhte hain.").
- "Yeh raha aapka question" jaisi lines mat boliye, aur difficulty level ya score ka zikr mat kijiye.

Agla question (Hinglish mein):`;

const EVALUATION_EN_DETAILED = `You are an experienced interviewer grading a candidate's answer.
The answer was transcribed from speech; judge the content, not small grammar slips.

Interview Question: {question}

Candidate's Answer: {answer}

Criteria:
1. Correctness: is it factually accurate?
2. Completeness: does it address every part of the question?
3. Clarity: is the explanation easy to follow?
4. Depth: does it go beyond the surface?

Reply in this JSON format:
{
    "rating": <float between 1.00 and 10.00 with two decimals>,
    "strengths": "<what was good, in detail>",
    "improvements": "<specific suggestions>",
    "missing_points": "<key concepts or details that were left out>"
}

Reply with the JSON only, no other text.`;

const EVALUATION_EN_CONCISE = `You are an experienced interviewer grading a candidate's answer.
The answer was transcribed from speech; judge the content, not small grammar slips.

Interview Question: {question}

Candidate's Answer: {answer}

Reply in this JSON format and keep it short:
{
    "rating": <float between 1.00 and 10.00 with two decimals>,
    "strengths": "<what was good, max 50 words>",
    "improvements": "<specific suggestions, max 50 words>",
    "missing_points": "<key concepts left out, max 50 words>"
}

Reply with the JSON only, no other text. Every field must stay under 50 words.`;

const EVALUATION_HI_DETAILED = `Aap ek experienced interviewer hain jo candidate ke answer ko grade kar rahe hain.
Answer English, Hindi ya Hinglish mein ho sakta hai aur speech-to-text se aaya hai, isliye transcription ki galtiyon ko ignore karke meaning samjhiye.

Interview Question: {question}

Candidate ka Answer: {answer}

Criteria:
1. Correctness: kya answer factually sahi hai?
2. Completeness: kya question ke saare parts cover hue?
3. Clarity: kya explanation clear hai?
4. Depth: kya surface se aage ki samajh dikhti hai?

Is JSON format mein jawab dijiye (Hinglish mein):
{
    "rating": <1.00 se 10.00 ke beech float, do decimal places>,
    "strengths": "<kya achha tha, detail mein>",
    "improvements": "<sudhaar ke specific suggestions>",
    "missing_points": "<kaunse important concepts chhoot gaye>"
}

Sirf JSON dijiye, koi extra text nahi.`;

const EVALUATION_HI_CONCISE = `Aap ek experienced interviewer hain jo candidate ke answer ko grade kar rahe hain.
Answer English, Hindi ya Hinglish mein ho sakta hai aur speech-to-text se aaya hai.

Interview Question: {question}

Candidate ka Answer: {answer}

Is JSON format mein chhota jawab dijiye (Hinglish mein):
{
    "rating": <1.00 se 10.00 ke beech float, do decimal places>,
    "strengths": "<kya achha tha, max 50 words>",
    "improvements": "<sudhaar ke suggestions, max 50 words>",
    "missing_points": "<chhoote hue concepts, max 50 words>"
}

Sirf JSON dijiye, koi extra text nahi. Har field 50 words se kam rakhiye.`;

const OVERALL_SUMMARY = `You are a career coach reviewing a candidate's complete mock interview.

Role: {role}
Number of Questions: {num_questions}
Average Rating: {avg_rating}/10.00

Question-by-Question History:
{history}

Write a performance summary that covers:
1. Overall strengths
2. Areas for improvement
3. Readiness for this role (be honest)
4. Three to five concrete next steps

Keep it professional and constructive, 200-250 words.`;

const TEMPLATES = {
  resume_summary: RESUME_SUMMARY,
  question: {
    [Language.EN]: QUESTION_EN,
    [Language.HI]: QUESTION_HI,
  },
  // Gemini gets the fuller feedback contract; OpenRouter models get a word cap.
  evaluation: {
    [Language.EN]: {
      [ProviderFamily.Gemini]: EVALUATION_EN_DETAILED,
      [ProviderFamily.OpenRouter]: EVALUATION_EN_CONCISE,
    },
    [Language.HI]: {
      [ProviderFamily.Gemini]: EVALUATION_HI_DETAILED,
      [ProviderFamily.OpenRouter]: EVALUATION_HI_CONCISE,
    },
  },
  overall_summary: OVERALL_SUMMARY,
} satisfies {
  resume_summary: string;
  question: Record<Language, string>;
  evaluation: Record<Language, Record<ProviderFamily, string>>;
  overall_summary: string;
};

export const selectPrompt = (stage: PromptStage, language: Language, provider: ProviderFamily): string => {
  switch (stage) {
    case 'resume_summary':
      return TEMPLATES.resume_summary;
    case 'question':
      return TEMPLATES.question[language];
    case 'evaluation':
      return TEMPLATES.evaluation[language][provider];
    case 'overall_summary':
      return TEMPLATES.overall_summary;
    default: {
      const unreachable: never = stage;
      throw new Error(`Unknown prompt stage: ${String(unreachable)}`);
    }
  }
};

export type PromptValues = Record<string, string | number>;

/**
 * Fills {name} placeholders. Unknown placeholders are left untouched so a
 * missing value shows up in the prompt rather than as an empty string.
 */
export const fillPrompt = (template: string, values: PromptValues): string =>
  template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : match,
  );

export const buildPrompt = (
  stage: PromptStage,
  language: Language,
  provider: ProviderFamily,
  values: PromptValues,
): string => fillPrompt(selectPrompt(stage, language, provider), values);
