import fs from 'fs';
import path from 'path';
import { env } from './config/env';
import { createKnowledgebaseClient } from './services/knowledgebase';
import { PdfTextError, extractPdfText } from './services/pdf_text';
import { ReportService } from './services/report_service';
import { createVaultService } from './services/vault';

const PLACEHOLDER_CONSUMER = { fullName: '[Your Full Name]', address: '[Street Address]\n[City, State ZIP]' };

async function main(): Promise<void> {
    const inputDir = path.resolve(process.argv[2] ?? 'reports');
    const parsedRound = Number.parseInt(process.argv[3] ?? '1', 10);
    const roundNumber = Number.isNaN(parsedRound) || parsedRound < 0 ? 1 : parsedRound;

    if (!fs.existsSync(inputDir)) {
        throw new Error(`Input directory not found: ${inputDir}`);
    }

    const files = fs.readdirSync(inputDir).filter(name => name.toLowerCase().endsWith('.pdf')).sort();
    if (files.length === 0) {
        console.log(`[Batch] No PDF reports in ${inputDir}`);
        return;
    }

    const reportService = new ReportService(createVaultService(env), createKnowledgebaseClient(env));

    // One report at a time.
    for (const fileName of files) {
        console.log(`[Batch] Processing ${fileName}`);
        let text: string;
        try {
            text = await extractPdfText(await fs.promises.readFile(path.join(inputDir, fileName)));
        } catch (err: unknown) {
            if (err instanceof PdfTextError) {
                console.error(`[Batch] Skipping ${fileName}: ${err.message}`);
                continue;
            }
            throw err;
        }

        const analysis = await reportService.analyze({ text, fileName, consumer: PLACEHOLDER_CONSUMER, roundNumber });
        console.log(`[Batch] ${fileName}: ${analysis.message}`);

        const outDir = path.join(env.OUTPUT_DIR, analysis.bureau.replace(/\s+/g, '_'));
        await fs.promises.mkdir(outDir, { recursive: true });
        for (const letter of analysis.letters) {
            const target = path.join(outDir, `${path.parse(fileName).name}_${letter.fileName}`);
            await fs.promises.writeFile(target, letter.markdown, 'utf8');
            console.log(`[Batch] Wrote ${target}`);
        }
    }
}

main().catch((err: unknown) => {
    console.error('[Batch] Failed:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
