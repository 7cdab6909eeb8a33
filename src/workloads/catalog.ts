export type WorkloadFamily = 'MCP' | 'Agentic';

export interface PromptParams {
  context: string;
}

export interface PromptTemplate {
  readonly name: string;
  readonly family: WorkloadFamily;
  /** Share of the configured max context this template aims for. */
  readonly contextFraction: number;
  /** Background material substituted into the template body. */
  readonly context: string;
  render(params: PromptParams): string;
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

function defineTemplate(template: PromptTemplate): PromptTemplate {
  return Object.freeze(template);
}

// ---------------------------------------------------------------------------
// MCP: tool-calling assistants over a large attached context
// ---------------------------------------------------------------------------

const fileSearch = defineTemplate({
  name: 'file_search',
  family: 'MCP',
  contextFraction: 0.3,
  context: range(10)
    .flatMap(i => range(5).map(j => `src/module_${i}/file_${j}.py`))
    .join('\n'),
  render: ({ context }) => `You are an AI assistant with access to a file system.
The user has asked you to search for files matching a pattern.
Available tools:
- search_files(pattern: str, path: str) -> List[str]
- read_file(path: str) -> str
- list_directory(path: str) -> List[str]

Context: You have access to a large codebase with the following structure:
${context}

User request: Find all Python files that contain database connection logic and summarize their contents.
`,
});

const dataAnalysis = defineTemplate({
  name: 'data_analysis',
  family: 'MCP',
  contextFraction: 0.5,
  context: JSON.stringify(
    {
      tables: {
        sales: { columns: range(10).flatMap(() => ['id', 'product_id', 'amount', 'date', 'customer_id']) },
        products: { columns: range(10).flatMap(() => ['id', 'name', 'category', 'price']) },
        customers: { columns: range(10).flatMap(() => ['id', 'name', 'email', 'region']) },
      },
      sample_data: range(20).map(i => ({ record: i, data: 'sample'.repeat(10) })),
    },
    null,
    2,
  ),
  render: ({ context }) => `You are a data analysis AI with access to query tools.
Available tools:
- execute_query(sql: str) -> DataFrame
- calculate_statistics(data: List) -> Dict
- create_visualization(data: List, chart_type: str) -> Image

Context: Database schema and sample data:
${context}

User request: Analyze the sales trends over the last quarter and identify the top performing products.
`,
});

const codeReview = defineTemplate({
  name: 'code_review',
  family: 'MCP',
  contextFraction: 0.4,
  context: range(5)
    .map(i => `# File: module_${i}.py\n` + 'def function():\n    pass\n'.repeat(20))
    .join('\n\n'),
  render: ({ context }) => `You are a code review AI assistant.
Available tools:
- analyze_code(file_path: str) -> CodeAnalysis
- check_security(code: str) -> SecurityReport
- suggest_improvements(code: str) -> List[Suggestion]

Context: Review the following code files:
${context}

User request: Review these files for security vulnerabilities and performance issues.
`,
});

// ---------------------------------------------------------------------------
// Agentic: multi-step reasoning over accumulated history
// ---------------------------------------------------------------------------

const researchTask = defineTemplate({
  name: 'research_task',
  family: 'Agentic',
  contextFraction: 0.6,
  context: range(10)
    .map(i => `Study ${i}: ` + 'Finding '.repeat(30))
    .join('\n'),
  render: ({ context }) => `You are an autonomous research agent. Your task involves:
1. Gathering information from multiple sources
2. Synthesizing the information
3. Drawing conclusions
4. Providing recommendations

Previous research context:
${context}

Current task: Research the impact of AI on software development practices and provide a comprehensive analysis.
Please break this down into subtasks and execute them systematically.
`,
});

const planningTask = defineTemplate({
  name: 'planning_task',
  family: 'Agentic',
  contextFraction: 0.7,
  context: JSON.stringify(
    range(5).map(i => ({
      session: i,
      tasks: range(5).map(() => 'task'.repeat(10)),
      outcomes: 'success'.repeat(20),
    })),
    null,
    2,
  ),
  render: ({ context }) => `You are a planning agent responsible for breaking down complex tasks.
You have access to previous planning sessions and outcomes.

Historical planning data:
${context}

Current objective: Design and implement a scalable microservices architecture for an e-commerce platform.
Create a detailed implementation plan with:
- Architecture decisions
- Technology choices
- Implementation steps
- Risk assessment
- Timeline estimates
`,
});

const problemSolving = defineTemplate({
  name: 'problem_solving',
  family: 'Agentic',
  contextFraction: 0.8,
  context: range(15)
    .map(
      i =>
        `Log entry ${i}: ` +
        JSON.stringify({ timestamp: i, level: 'ERROR', message: 'error'.repeat(10), stack: 'trace'.repeat(10) }),
    )
    .join('\n'),
  render: ({ context }) => `You are a problem-solving agent with reasoning capabilities.
You need to analyze complex scenarios and provide solutions.

Problem context and constraints:
${context}

Problem: A distributed system is experiencing intermittent failures. Analyze the logs, identify root causes, and propose solutions.
Use chain-of-thought reasoning to work through this systematically.
`,
});

export const mcpTemplates: readonly PromptTemplate[] = Object.freeze([fileSearch, dataAnalysis, codeReview]);

export const agenticTemplates: readonly PromptTemplate[] = Object.freeze([researchTask, planningTask, problemSolving]);

export const allTemplates: readonly PromptTemplate[] = [...mcpTemplates, ...agenticTemplates];

export function workloadTag(template: PromptTemplate): string {
  return `${template.family}_${template.name}`;
}
