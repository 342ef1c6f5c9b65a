import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * 프로젝트 루트 경로 계산
 *
 * mastra dev/build 시 번들은 .mastra/output 아래에서 실행되므로
 * 위로 올라가며 package.json을 찾아 실제 프로젝트 루트를 결정합니다.
 */
export function resolveProjectRoot(): string {
  let dir = process.cwd();
  for (let i = 0; i < 10; i++) {
    if (!dir.includes("/.mastra/") && existsSync(resolve(dir, "package.json"))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return process.cwd();
}

/**
 * 모듈 옆의 데이터 파일 경로
 * 번들 실행처럼 파일이 복사되지 않은 경우 소스 트리(`src/mastra/...`)에서 찾습니다.
 */
export function resolveDataFile(
  moduleUrl: string,
  sourceDir: string,
  fileName: string,
): string {
  const besideModule = fileURLToPath(new URL(`./${fileName}`, moduleUrl));
  if (existsSync(besideModule)) return besideModule;
  return resolve(resolveProjectRoot(), sourceDir, fileName);
}
