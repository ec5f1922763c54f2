import dotenv from "dotenv";
dotenv.config();

import fs from "fs";
import { parseAnalyzeArgs } from "./cliArgs.js";
import { createAnalysisService } from "./server/bootstrap.js";
import { startServer } from "./server/index.js";
import { ValidationError, errorMessage } from "./errors.js";
import { formatPercent } from "./utils/math.js";
import { SUPPORTED_LANGUAGES } from "./nlp/preprocess/languages.js";
import type { Report } from "./models/Report.js";

const args = process.argv.slice(2);

function printHelp() {
    console.log(`
🚀 Repository Similarity Analyzer

Usage:
  npm run analyze -- <repo> <repo> [...repos] [options]
  npm run server

Commands:
  analyze <repo>...  레포지토리 간 코드 유사도 분석 (2개 이상)
  serve              HTTP API 서버 실행
  help               도움말 출력

Options (analyze):
  --language=<lang>      대상 언어 (기본값: python)
                         ${SUPPORTED_LANGUAGES.join(", ")}
  --threshold=<0..1>     의심 판정 기준 (기본값: 0.75)
  --branch=<name>        브랜치 (기본값: main, 없으면 master)
  --aggressive           식별자 익명화 (변수명 변경 탐지)
  --out=<file>           보고서 JSON 저장 경로

Examples:
  npm run analyze -- https://github.com/a/x https://github.com/b/y --language=java
  npm run analyze -- ./repo-a ./repo-b --threshold=0.8 --out=report.json

Environment: see .env.example (EMBEDDING_PROVIDER, REPOSITORY_SOURCE, EXPLANATION_MODE, ...)
`);
}

function printReport(report: Report): void {
    const { summary, repositoryMatrix, suspiciousPairs, commitFlags } = report;

    console.log("\n📊 Similarity Matrix");
    console.log("---------------------------------------------------");
    repositoryMatrix.repos.forEach((repo, i) => {
        const row = (repositoryMatrix.similarities[i] ?? []).map((value) => value.toFixed(2)).join("  ");
        console.log(`[${i}] ${row}  ${repo}`);
    });

    console.log(`\n🚨 Suspicious pairs: ${summary.suspiciousPairs} (file pairs compared: ${summary.totalFilePairsCompared})`);
    for (const pair of suspiciousPairs) {
        console.log(`\n• ${pair.repoA} ↔ ${pair.repoB}: ${formatPercent(pair.repoSimilarity)}`);
        for (const filePair of pair.filePairs.slice(0, 5)) {
            console.log(
                `    ${filePair.fileA.path} ↔ ${filePair.fileB.path} ` +
                    `${formatPercent(filePair.combinedScore)} (${filePair.band})`
            );
        }
        if (pair.explanation) {
            console.log(pair.explanation.replace(/^/gm, "    "));
        }
    }

    console.log(`\n🔁 Commit flags: ${commitFlags.length}`);
    for (const flag of commitFlags.slice(0, 10)) {
        console.log(
            `    ${flag.commitA.commitHash.slice(0, 7)} ↔ ${flag.commitB.commitHash.slice(0, 7)} ` +
                `[${flag.reason}] diff ${formatPercent(flag.diffSimilarity)}, message ${formatPercent(flag.messageSimilarity)}`
        );
    }
}

async function runAnalyzeCommand(commandArgs: string[]): Promise<boolean> {
    const { input, out } = parseAnalyzeArgs(commandArgs);
    const service = createAnalysisService();

    const { job, done } = service.submit(input);
    console.log(`🆔 Job ${job.id}`);

    const finished = await done;
    if (finished.status !== "completed" || !finished.result) {
        console.error(`❌ Analysis failed at ${finished.failedStage ?? "unknown stage"}: ${finished.error ?? "unknown error"}`);
        return false;
    }

    printReport(finished.result);
    if (out) {
        fs.writeFileSync(out, JSON.stringify(finished.result, null, 2), "utf-8");
        console.log(`\n💾 Report saved to ${out}`);
    }
    return true;
}

async function main(): Promise<number> {
    const [cmd, ...rest] = args;

    if (!cmd || cmd === "help" || cmd === "--help" || cmd === "-h") {
        printHelp();
        return 0;
    }

    if (cmd === "serve" || cmd === "server") {
        startServer();
        return -1;
    }

    if (cmd === "analyze") {
        try {
            return (await runAnalyzeCommand(rest)) ? 0 : 1;
        } catch (error) {
            if (error instanceof ValidationError) {
                console.error("❌ Invalid arguments:");
                error.issues.forEach((issue) => console.error(`   - ${issue}`));
                console.error("\n   Run with `help` for usage.");
            } else {
                console.error(`❌ ${errorMessage(error)}`);
            }
            return 1;
        }
    }

    console.error(`❌ Unknown command: ${cmd}`);
    printHelp();
    return 1;
}

main()
    .then((code) => {
        // -1: long-running server, keep the process alive
        if (code >= 0) process.exit(code);
    })
    .catch((err) => {
        console.error(err);
        process.exit(1);
    });
