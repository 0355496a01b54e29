import { DatasetCatalog } from '../catalog.js';
import { formatError } from '../errors.js';
import { Check, CheckContext, CheckResult } from '../types.js';

export const datasetCheck: Check = {
  name: 'Dataset',
  description: 'Verify the dataset root holds DICOM payloads',
  quick: true,
  async run(ctx: CheckContext): Promise<CheckResult> {
    const start = performance.now();
    const catalog = new DatasetCatalog({ root: ctx.catalogRoot });

    try {
      const descriptors = await catalog.discover();
      const duration = performance.now() - start;
      const categories = catalog.classify(descriptors);
      const summary = [...categories.entries()]
        .map(([category, items]) => `${category}=${items.length}`)
        .join(', ');

      return {
        name: 'Dataset',
        success: true,
        duration,
        message: `${descriptors.length} payloads found`,
        details: summary,
      };
    } catch (error) {
      const duration = performance.now() - start;
      return {
        name: 'Dataset',
        success: false,
        duration,
        message: 'No usable payloads',
        details: formatError(error),
        suggestion: `Point DICOM_ROOT_DIR (${ctx.catalogRoot}) at a directory of .dcm files`,
      };
    }
  },
};
