export const STRUCTURED_OUTPUT_SYSTEM_PROMPT = (schema: Record<string, unknown>) => `You are a helpful assistant that always responds with valid JSON.
The response must match the following JSON schema exactly:

${JSON.stringify(schema, null, 2)}

Return only the JSON object, without any additional text or markdown formatting.`;
