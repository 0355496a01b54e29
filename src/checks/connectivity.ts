import { formatError } from '../errors.js';
import { Check, CheckContext, CheckResult } from '../types.js';

export const connectivityCheck: Check = {
  name: 'Connectivity',
  description: 'Verify the target answers C-ECHO',
  quick: true,
  async run(ctx: CheckContext): Promise<CheckResult> {
    const start = performance.now();
    const { target } = ctx;
    const address = `${target.calledAeTitle}@${target.host}:${target.port}`;

    try {
      const ok = await ctx.client.echo(target);
      const duration = performance.now() - start;

      if (ok) {
        return {
          name: 'Connectivity',
          success: true,
          duration,
          message: `C-ECHO accepted by ${address}`,
        };
      }
      return {
        name: 'Connectivity',
        success: false,
        duration,
        message: 'C-ECHO failed',
        suggestion: `Check that ${address} is running and accepts calling AE title ${target.callingAeTitle}`,
      };
    } catch (error) {
      const duration = performance.now() - start;
      return {
        name: 'Connectivity',
        success: false,
        duration,
        message: 'Connection failed',
        details: formatError(error),
        suggestion: `Verify DICOM_TARGET_HOST and DICOM_TARGET_PORT (${target.host}:${target.port})`,
      };
    }
  },
};
