/**
 * Makes a small local directory, uploads it, then downloads it again into a
 * second local directory, all within one sftp session.
 *
 *   npm run build && CLUSTER_SCRIPTER_SITE=cluster.example.edu npm run example
 */

import { Scripter } from '../src/scripter.js';

async function main(): Promise<void> {
  const scripter = await Scripter.create({
    configPath: '~/.cluster-scripter/config.txt',
    mode: 'sftp'
  });

  scripter.addStep('### Making a test dir/file...');
  scripter.addStep('! mkdir -p test_dir');
  scripter.addStep("! echo 'some text' > test_dir/test_file.txt");
  scripter.addStep('### Transferring the test dir/file to the cluster...');
  scripter.put('test_dir/*');
  scripter.addStep('### Transferring it back to a new directory...');
  scripter.addStep('! mkdir -p test_dir2');
  scripter.get('test_dir/*', { outdir: 'test_dir2' });

  scripter.printPreview();
  scripter.run();
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
