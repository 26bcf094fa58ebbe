import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * JSON 결과 출력 (--out 지정 시 파일, 아니면 stdout)
 */
export async function writeJsonOutput(data: unknown, outPath?: string): Promise<void> {
  const json = JSON.stringify(data, null, 2);

  if (!outPath) {
    console.log(json);
    return;
  }

  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, `${json}\n`, 'utf-8');
}
