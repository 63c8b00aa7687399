import type { RawCandidate } from '@/types';

// System prompt for clinic verification
export const CLINIC_VERIFIER_SYSTEM_PROMPT = `あなたは医療機関の営業リストを精査する担当者です。
Google マップから取得した1件のクリニック情報を読み、営業対象として適切かを判定してください。

営業対象（qualifies: true）:
- 地域密着型の個人クリニック
- 1〜10院程度の小規模チェーン
- 比較サイトやアフィリエイトサイトであまり見かけないクリニック

営業対象外（qualifies: false）:
- アフィリエイト広告を大規模に出稿している大手チェーン
  （例: AGAスキンクリニック、湘南美容クリニック、TCB東京中央美容外科、ゴリラクリニック、
  Dクリニック、クリニックフォア、イースト駅前クリニック、DMMオンラインクリニック）
- ポータルサイト・口コミサイト・比較サイトの掲載ページ（EPARK、ホットペッパー等）
- クリニックではない施設（薬局、美容室、サロン等）

重要: ウェブサイトのドメインからクリニックを正確に特定してください。
例: ams-smile.co.jp はスマイルAGAクリニックであり、湘南美容クリニックではありません。

normalizedName には院名・支店名を除いた正式なクリニック名を入れてください。
例: "AGAスキンクリニック新宿院" → "AGAスキンクリニック"
例: "スマイルAGAクリニック渋谷院" → "スマイルAGAクリニック"

IMPORTANT: Return ONLY valid JSON, no markdown, no code blocks, just the JSON object.

{
  "qualifies": true,
  "normalizedName": "クリニック名",
  "rationale": "判定理由（簡潔に）"
}`;

// Generate the user prompt for one candidate
export function buildVerificationPrompt(candidate: RawCandidate): string {
  const lines: string[] = [];

  lines.push(`クリニック名: ${candidate.name}`);
  lines.push(`住所: ${candidate.address || '不明'}`);
  lines.push(`電話番号: ${candidate.phone || '不明'}`);
  lines.push(`ウェブサイト: ${candidate.website || 'なし'}`);

  if (candidate.categories.length > 0) {
    lines.push(`カテゴリ: ${candidate.categories.join(', ')}`);
  }
  if (candidate.rating !== null) {
    lines.push(`評価: ${candidate.rating}${candidate.reviewCount !== null ? ` (${candidate.reviewCount}件のクチコミ)` : ''}`);
  }
  lines.push(`検索地域: ${candidate.region}`);

  return `以下のクリニックを判定してください:\n\n${lines.join('\n')}`;
}
