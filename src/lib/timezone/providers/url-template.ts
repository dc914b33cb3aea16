export function fillIpTemplate(template: string, ip: string): string {
  return template.replaceAll("{ip}", encodeURIComponent(ip));
}
