import { parseAllDocuments } from 'yaml';

export interface LintIssue {
  /** 1-based line of the opening fence. */
  line: number;
  language: string;
  message: string;
}

interface CodeBlock {
  line: number;
  language: string;
  body: string;
  closed: boolean;
}

const FENCE = /^ {0,3}(`{3,}|~{3,})\s*([^\s`]*)/;

const extractBlocks = (text: string): CodeBlock[] => {
  const blocks: CodeBlock[] = [];
  const lines = text.split(/\r?\n/);
  let open: { fence: string; block: CodeBlock; body: string[] } | null = null;

  for (const [ index, line ] of lines.entries()) {
    if (open) {
      const closing = line.trim();
      if (closing.startsWith(open.fence[0].repeat(open.fence.length)) && /^(`+|~+)$/.test(closing)) {
        blocks.push({ ...open.block, body: open.body.join('\n'), closed: true });
        open = null;
      } else {
        open.body.push(line);
      }
      continue;
    }

    const match = FENCE.exec(line);
    if (match) {
      open = {
        fence: match[1],
        block: { line: index + 1, language: match[2].toLowerCase(), body: '', closed: false },
        body: [],
      };
    }
  }

  if (open) {
    const { block, body } = open;
    blocks.push({ ...block, body: body.join('\n') });
  }

  return blocks;
};

const firstLine = (message: string): string => message.split('\n')[0];

const checkBlock = (block: CodeBlock): string[] => {
  switch (block.language) {
    case 'yaml':
    case 'yml': {
      const messages: string[] = [];
      for (const doc of parseAllDocuments(block.body)) {
        messages.push(...doc.errors.map(err => firstLine(err.message)));
      }
      return messages;
    }
    case 'json':
      try {
        JSON.parse(block.body);
        return [];
      } catch (err) {
        return [ err instanceof Error ? err.message : String(err) ];
      }
    default:
      return [];
  }
};

/**
 * Check that every fenced YAML and JSON block in a Markdown document parses.
 */
export const lintMarkdown = (text: string): LintIssue[] =>
  extractBlocks(text).flatMap(block => {
    const messages = block.closed ? checkBlock(block) : [ 'code fence is never closed' ];
    return messages.map(message => ({ line: block.line, language: block.language, message }));
  });
