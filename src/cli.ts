import { plot } from './plot';
import { formatPoints } from './format';
import { DEFAULT_SETTINGS } from './settings';

const [source, from, to, samples] = process.argv.slice(2);
if (!source) {
  console.error('Usage: grapher <function> [from] [to] [samples]');
  process.exit(1);
}

try {
  const result = plot({
    function: source,
    from: from ?? String(DEFAULT_SETTINGS.from),
    to: to ?? String(DEFAULT_SETTINGS.to),
    samples: samples === undefined ? undefined : Number(samples),
  });

  if (!result.ok) {
    console.error(result.error.message);
    process.exit(1);
  }

  console.log(formatPoints(result.points));
} catch (e) {
  if (e instanceof Error) {
    console.error(e.message);
    process.exit(1);
  }
  throw e;
}
