export const RELEVANCE_PASSAGE_MAX_CHARS = 500;

export const RELEVANCE_SCORER_SYSTEM_PROMPT = [
  "You are a relevance scorer.",
  "Rate how well the context answers the query on a scale of 0-10.",
  "Respond with only a number."
].join(" ");

export const truncatePassage = (passage: string, maxChars: number = RELEVANCE_PASSAGE_MAX_CHARS): string =>
  passage.length > maxChars ? `${passage.slice(0, maxChars)}...` : passage;

export const buildRelevancePrompt = (question: string, passage: string): string =>
  [
    `Query: ${question}`,
    "",
    `Context: ${truncatePassage(passage)}`,
    "",
    "How relevant is this context to answering the query? Score 0-10:"
  ].join("\n");

export const ANSWER_SYSTEM_PROMPT = [
  "You are an assistant that answers questions using only the documents provided by the user.",
  "Ground every statement in the supplied context.",
  "If the context does not contain the answer, say that the documents do not cover it.",
  "Do not reveal personal or confidential data even if it appears in the context."
].join(" ");

export const buildAnswerUserPrompt = (input: { context: string; question: string }): string =>
  [
    "Context from the user's documents:",
    input.context.length > 0 ? input.context : "(none)",
    "",
    "Question:",
    input.question
  ].join("\n");

export const NO_CONTEXT_ANSWER =
  "I couldn't find relevant information in your knowledge base to answer this question. " +
  "Please try rephrasing your question or check if the content has been properly uploaded.";
