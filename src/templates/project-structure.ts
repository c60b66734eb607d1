export const projectStructureTemplate = {
  systemPrompt: `You are an expert at documenting software projects. You write project-structure.md files: Cursor rules that give the AI editor a persistent map of a codebase.`,

  formatInstructions: `Generate a comprehensive project-structure.md file for a Cursor Rules configuration.

Project Details:
- Project Name: {{projectName}}
- Tech Stack: {{techStack}}
- Main Files/Directories: {{mainFiles}}
- Architecture Notes: {{architectureNotes}}

Generate a well-structured markdown document that includes:
1. YAML frontmatter with description, globs: [], and alwaysApply: true
2. Clear overview of the project
3. Directory layout in tree format
4. Architecture explanation
5. Key technologies section
6. Running instructions
7. Environment variables (if applicable)

Use proper markdown formatting with headers, code blocks, and lists.
Output ONLY the markdown content, no explanations before or after.`,
};

// Used when no text generator is configured
export const projectStructureFallback = `---
description: "{{description}}"
globs: []
alwaysApply: true
---

# Project Structure: {{projectName}}

## Overview

{{overview}}

## Directory Layout

\`\`\`
{{directoryTree}}
\`\`\`

## Architecture

{{architecture}}

## Key Technologies

{{technologies}}

## Running the Application

\`\`\`bash
# Add your run instructions here
\`\`\`

## Environment Variables

- Add your environment variables here
`;
