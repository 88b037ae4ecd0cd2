import http from 'http';
import config, { s3EndpointUrl } from './config';
import { createApp } from './app';
import { multipartS3 } from './middleware/upload';

const startServer = async () => {
  const uploads = await multipartS3({
    s3: {
      endpoint: s3EndpointUrl(config.s3),
      region: config.s3.region,
      credentials: {
        accessKeyId: config.s3.accessKeyId,
        secretAccessKey: config.s3.secretAccessKey,
      },
    },
    ...config.upload,
  });

  const httpServer = http.createServer(createApp(uploads));
  httpServer.listen(config.port, () => {
    console.log(`Server is running on http://localhost:${config.port}`);
  });
};

startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
