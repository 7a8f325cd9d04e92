/**
 * Drives the pipeline from the command line.
 *
 *   run_pipeline.ts draft    <project> <version> <blueprint.json> [--new-draft]
 *   run_pipeline.ts finalize <project> <version>
 *   run_pipeline.ts attach   <project> <version> <shotIndex> <assetPath>
 *   run_pipeline.ts audio|effects|assemble|run|status <project> <version>
 *
 * Ctrl+C cancels between shots; finished shots are kept.
 */
import fs from 'fs';
import { loadConfig, validateConfig } from '../src/config';
import { createPipelineOrchestrator } from '../src/application/pipelines/PipelineFactory';
import { PipelineContext } from '../src/domain/entities/StageRecord';

const USAGE = 'Usage: run_pipeline.ts <draft|finalize|attach|audio|effects|assemble|run|status> <project> <version> [args]';

async function main(): Promise<void> {
    const [command, project, version, ...rest] = process.argv.slice(2);
    if (!command || !project || !version) {
        console.error(USAGE);
        process.exit(2);
    }

    const config = loadConfig();
    const configErrors = validateConfig(config);
    if (configErrors.length > 0 && ['audio', 'run'].includes(command)) {
        console.error('❌ Configuration validation failed:');
        configErrors.forEach((error) => console.error(`  - ${error}`));
        process.exit(1);
    }

    const orchestrator = createPipelineOrchestrator(config);
    const ctx: PipelineContext = { project, version };

    const controller = new AbortController();
    process.on('SIGINT', () => {
        console.warn('⏹️  Cancelling after the shots in progress...');
        controller.abort();
    });
    const options = { signal: controller.signal };

    let result: unknown;
    switch (command) {
        case 'draft': {
            const [file, flag] = rest;
            if (!file) {
                throw new Error('draft needs a blueprint JSON file');
            }
            const document: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
            result = await orchestrator.createDraft(ctx, document, { newDraft: flag === '--new-draft' });
            break;
        }
        case 'finalize':
            result = await orchestrator.finalize(ctx);
            break;
        case 'attach': {
            const [index, assetPath] = rest;
            if (!index || !/^\d+$/.test(index) || !assetPath) {
                throw new Error('attach needs <shotIndex> <assetPath>');
            }
            result = await orchestrator.attachAsset(ctx, Number(index), assetPath);
            break;
        }
        case 'audio':
            result = await orchestrator.synthesizeAudio(ctx, options);
            break;
        case 'effects':
            result = await orchestrator.renderEffects(ctx, options);
            break;
        case 'assemble':
            result = await orchestrator.assemble(ctx);
            break;
        case 'run':
            result = await orchestrator.runAll(ctx, options);
            break;
        case 'status':
            result = await orchestrator.status(ctx);
            break;
        default:
            console.error(USAGE);
            process.exit(2);
    }

    console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
    console.error('💥 Pipeline command failed:', error instanceof Error ? error.message : error);
    process.exit(1);
});
