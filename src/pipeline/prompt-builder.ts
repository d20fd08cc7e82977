/**
 * Prompt templates
 *
 * Schema text and user text are embedded verbatim. Nothing guards the model
 * prompt against instructions smuggled in through the natural-language query.
 */

export function buildSqlPrompt(schemaText: string, naturalQuery: string): string {
  return `You are a SQL expert. Convert the following natural language query to SQL.

Database Schema:
${schemaText}

Natural Language Query: ${naturalQuery}

Return only the SQL query without any explanation or formatting:
`;
}

export function buildQueryAssistantPrompt(queryDescription: string): string {
  return `I need help creating a SQL query for the following request:

${queryDescription}

Please help me by:
1. Understanding what data I need to retrieve
2. Suggesting the appropriate SQL query
3. Explaining how the query works

I have access to the database schema and can execute queries to test them.
`;
}

export function buildAnalysisTaskPrompt(analysisGoal: string): string {
  return `I need to perform a database analysis with the following goal:

${analysisGoal}

Please help me by:
1. Understanding what tables and data are relevant
2. Suggesting the queries needed to gather the required information
3. Helping me interpret the results

I can explore the database schema, execute queries, and analyze the data.
`;
}
