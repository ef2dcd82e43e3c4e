import type { ExtendedRagContext, RagContext, RagContextObject } from './types.js';

function scoreLabel(score: number | null): string {
  return score ? `score=${score.toFixed(2)}` : 'score=N/A';
}

/**
 * Render a basic context as prompt text:
 * numbered snippets in [CONTEXT], then one line per object in [SOURCES].
 */
export function toContextText(context: Pick<RagContext, 'items'>): string {
  const lines = ['[CONTEXT]'];

  context.items.forEach((item, index) => {
    let header = `${index + 1}) (type=${item.object_type} ${scoreLabel(item.relevance_score)})`;
    if (item.title) header += ` Title: ${item.title}`;
    lines.push(header);
    if (item.link) lines.push(`   Link: ${item.link}`);
    lines.push(`   Snippet: ${item.content}`);
    if (index < context.items.length - 1) lines.push('');
  });

  lines.push('[/CONTEXT]', '', '[SOURCES]');
  for (const item of context.items) {
    lines.push(`- ${item.object_type}:${item.object_id}${item.link ? ` -> ${item.link}` : ''}`);
  }
  lines.push('[/SOURCES]');

  return lines.join('\n');
}

function layerLines(marker: string, items: RagContextObject[]): string[] {
  const lines: string[] = [];
  items.forEach((item, index) => {
    let header = `[#${marker}${index + 1}] (type=${item.object_type} ${scoreLabel(item.relevance_score)})`;
    if (item.title) header += ` ${item.title}`;
    lines.push(header);
    if (item.link) lines.push(`       Link: ${item.link}`);
    lines.push(`       ${item.content}`, '');
  });
  return lines;
}

/**
 * Render a layered context with [#A1], [#B1], [#C1] markers.
 */
export function toExtendedContextText(context: Pick<ExtendedRagContext, 'layer_a' | 'layer_b' | 'layer_c'>): string {
  return [
    'CONTEXT:',
    ...layerLines('A', context.layer_a),
    ...layerLines('B', context.layer_b),
    ...layerLines('C', context.layer_c),
  ].join('\n');
}
