const VUE_FENCE = /```vue[^\n]*\n([\s\S]*?)```/;
const ANY_FENCE = /```[^\n]*\n([\s\S]*?)```/;

/** Component source from a single-shot reply: a ```vue block, else the first fenced block, else the whole reply. */
export const extractCode = (reply: string): string => {
  const vue = VUE_FENCE.exec(reply);
  if (vue?.[1] !== undefined) return vue[1].trim();
  const any = ANY_FENCE.exec(reply);
  if (any?.[1] !== undefined) return any[1].trim();
  return reply.trim();
};
