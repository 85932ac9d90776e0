import { env } from "./config/env.js";
import { collectContracts } from "./contracts/defense.js";
import { logger } from "./log/logger.js";
import { APPAREL_NOTES, CONFLICT_NOTES } from "./manual/lists.js";
import { runSnapshot } from "./snapshot/builder.js";
import { createSourceRegistry } from "./sources/index.js";
import { FileSnapshotStore } from "./store/snapshotStore.js";

async function main() {
    logger.info(
        { snapshotPath: env.SNAPSHOT_PATH, tradingEconomics: env.TE_KEY !== undefined },
        "Snapshot builder starting..."
    );

    const store = new FileSnapshotStore(env.SNAPSHOT_PATH);
    const { resolutions } = await runSnapshot({
        store,
        sources: createSourceRegistry({ tradingEconomicsKey: env.TE_KEY }),
        collaborators: {
            contracts: () => collectContracts(6),
            conflicts: () => [...CONFLICT_NOTES],
            apparel: () => [...APPAREL_NOTES],
        },
    });

    for (const r of resolutions) {
        logger.info(
            {
                commodity: r.quote.name,
                price: r.quote.price,
                pct: r.quote.pct,
                state: r.state,
                priceSource: r.priceSource,
                baselineSource: r.baselineSource,
            },
            "Commodity quote"
        );
    }

    logger.info({ path: store.path }, `Wrote ${store.path}`);
}

main()
    .then(() => {
        // Limiter refresh timers and keep-alive sockets hold the event loop open
        process.exit(0);
    })
    .catch((err) => {
        logger.fatal({ err }, "Snapshot builder crashed");
        process.exit(1);
    });
