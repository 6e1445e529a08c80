import { DiscoverOptions } from '../types.js';
import { runDiscovery } from './run.js';

export async function discoverAction(url: string, options: DiscoverOptions): Promise<void> {
    console.log(`\n[JobTrail] Target: ${url}`);
    const summary = await runDiscovery([url], options);
    const site = summary?.sites[0];
    if (!site) return;

    console.log(`[JobTrail] Outcome: ${site.outcome} (${site.terminalState}: ${site.terminationReason})`);
    if (site.pages.length > 0) {
        console.log(`[JobTrail] Path: ${site.pages.join(' -> ')}`);
    }
}
