import { runMain } from '@main/cli/cli-support';
import { runUpdateCli } from '@main/cli/update-commands';

runMain((argv, io) => runUpdateCli(argv, io));
