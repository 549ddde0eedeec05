import { runMain } from '@main/cli/cli-support';
import { runReleaseCli } from '@main/cli/release-commands';

runMain((argv, io) => runReleaseCli(argv, io));
