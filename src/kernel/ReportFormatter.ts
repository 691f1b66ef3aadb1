/**
 * ReportFormatter - renders solve and verify results as text, JSON or YAML
 *
 * Text layout for a solve:
 *   [*** Not a solution! ***]      only when a check ran and failed
 *   <elapsed seconds>
 *   <cover size>
 *   [optimum <k>, ratio <r>]       only when a reference optimum is known
 *   <elements of each chosen subset, one subset per line>   unless skipPrint
 */

import * as yaml from 'js-yaml';
import { approximationRatio } from './CoverVerifier';
import { CoverVerification, OutputFormat, SetCoverInstance, SolveReport } from '../core/types';

export const NOT_A_SOLUTION = '*** Not a solution! ***';

export interface FormatOptions {
    format: OutputFormat;
    skipPrint?: boolean;
}

export class ReportFormatter {
    static formatSolve(report: SolveReport, instance: SetCoverInstance, options: FormatOptions): string {
        if (options.format === 'text') {
            return this.solveText(report, instance, options.skipPrint ?? false);
        }
        const doc = {
            instance: report.instance,
            universeSize: report.universeSize,
            subsetCount: report.subsetCount,
            strategy: report.strategy,
            elapsedSeconds: report.elapsedSeconds,
            coverSize: report.cover.length,
            totalWeight: report.totalWeight,
            cover: report.cover,
            referenceOptimum: report.referenceOptimum,
            verification: report.verification,
            steps: report.steps,
            ...(options.skipPrint ? {} : { subsets: chosenElements(report.cover, instance) })
        };
        return this.serialize(doc, options.format);
    }

    static formatVerification(result: CoverVerification, universeSize: number, format: OutputFormat): string {
        if (format !== 'text') {
            return this.serialize({ universeSize, ...result }, format);
        }

        const lines: string[] = [];
        if (result.valid) {
            lines.push(`Cover is valid: ${result.coverSize} subset(s) cover all ${universeSize} element(s)`);
        } else {
            lines.push(NOT_A_SOLUTION);
            lines.push(`covered ${result.coveredCount}/${universeSize} element(s) with ${result.coverSize} subset(s)`);
            if (result.missingElements.length > 0) {
                lines.push(`missing elements: ${result.missingElements.join(' ')}`);
            }
            if (result.invalidIndices.length > 0) {
                lines.push(`invalid indices: ${result.invalidIndices.join(' ')}`);
            }
        }
        if (result.duplicateIndices.length > 0) {
            lines.push(`duplicate indices: ${result.duplicateIndices.join(' ')}`);
        }
        if (result.ratio !== null) {
            lines.push(`ratio ${result.ratio.toFixed(3)} (greedy bound ${result.greedyBound.toFixed(3)})`);
        }
        return lines.join('\n') + '\n';
    }

    private static solveText(report: SolveReport, instance: SetCoverInstance, skipPrint: boolean): string {
        const lines: string[] = [];
        if (report.verification && !report.verification.valid) {
            lines.push(NOT_A_SOLUTION);
        }
        lines.push(report.elapsedSeconds.toFixed(6));
        lines.push(String(report.cover.length));
        const ratio = approximationRatio(report.cover.length, report.referenceOptimum);
        if (ratio !== null) {
            lines.push(`optimum ${report.referenceOptimum}, ratio ${ratio.toFixed(3)}`);
        }
        if (!skipPrint) {
            for (const elements of chosenElements(report.cover, instance)) {
                lines.push(elements.join(' '));
            }
        }
        return lines.join('\n') + '\n';
    }

    /**
     * Same dump options as the canonical YAML used elsewhere: 2-space indent, no wrapping, no refs
     */
    private static serialize(doc: object, format: 'json' | 'yaml'): string {
        if (format === 'json') {
            return JSON.stringify(doc, null, 2) + '\n';
        }
        return yaml.dump(doc, {
            indent: 2,
            lineWidth: -1,
            noRefs: true,
            sortKeys: false,
            quotingType: '"',
            forceQuotes: false,
            noCompatMode: true,
            condenseFlow: false
        });
    }
}

/**
 * Sorted elements of each chosen subset, in cover order
 */
function chosenElements(cover: readonly number[], instance: SetCoverInstance): number[][] {
    return cover.map(index => Array.from(instance.subsets[index] ?? []).sort((a, b) => a - b));
}
