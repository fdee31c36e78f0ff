import type { QueryResult } from '../../../domain/VectorRecord.js';

export const NO_ANSWER_MESSAGE = "I don't have enough information to answer this question.";

export const formatContext = (results: QueryResult[]): string =>
  results
    .map((result, i) => `[Document ${i + 1}, Score: ${result.score.toFixed(2)}]\n${result.text}`)
    .join('\n\n');

export const RAG_ANSWER_PROMPT = (context: string, question: string) => `You are a helpful assistant that answers questions based on the provided context.

Context:
${context}

Question: ${question}

Answer the question using only the context above. If the context doesn't contain the answer, say "${NO_ANSWER_MESSAGE}"

Provide a concise and accurate answer:`;

export const RAG_STRUCTURED_PROMPT = (context: string, question: string) => `You are a helpful assistant that answers questions based on the provided context.

Context:
${context}

Question: ${question}

Answer the question using only the context above. If the context doesn't contain the answer, indicate this explicitly in your response.`;
