export enum OutputFormat {
  Text = 'text',
  Json = 'json',
}
