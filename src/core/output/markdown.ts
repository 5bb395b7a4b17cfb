import { writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import type { SummaryRecord } from '../../types/index.js';

export interface MarkdownOptions {
  locale: string;
  generatedAt?: Date;
}

export class MarkdownGenerator {
  generate(record: SummaryRecord, options: MarkdownOptions): string {
    const frontmatter = this.generateFrontmatter(record, options);
    const concise = this.generateConcise(record.concise);
    const detail = this.generateDetail(record.detail);

    return `${frontmatter}

# ${record.title}

[Watch on YouTube](${record.url})

---

${concise}

---

${detail}
`;
  }

  private generateFrontmatter(record: SummaryRecord, options: MarkdownOptions): string {
    const generatedAt = options.generatedAt ?? new Date();

    return `---
title: "${this.escapeYaml(record.title)}"
url: "${record.url}"
summarized_at: "${generatedAt.toISOString()}"
locale: "${options.locale}"
---`;
  }

  private generateConcise(concise: string): string {
    return `## Summary

${concise}`;
  }

  private generateDetail(detail: string[]): string {
    if (detail.length === 0) return '';

    const parts = detail.map((text, i) => `### Part ${i + 1}/${detail.length}\n\n${text}`).join('\n\n');

    return `## Details

${parts}`;
  }

  async writeToFile(content: string, outputPath: string): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');
  }

  private escapeYaml(str: string): string {
    return str.replace(/"/g, '\\"').replace(/\n/g, ' ');
  }
}
